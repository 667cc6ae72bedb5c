/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

/**
 * Hono environment type for the Aliaspay app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;
  };
}

/**
 * Environment added by `validateBody` for the handler that follows it.
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}
