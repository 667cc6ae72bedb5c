/**
 * SimulatedRail — in-process settlement for development and tests.
 *
 * Every instruction settles immediately with a random `0x` + 64-hex hash.
 * Transfers and splits report `confirmed`; subscriptions report `active`
 * along with a `sim_sub_` identifier.
 */

import { randomBytes } from "node:crypto";
import type { RailInstruction, RailResult, SettlementRail } from "../types.js";

export class SimulatedRail implements SettlementRail {
  readonly name = "simulated";

  /** Instructions received, in order */
  readonly instructions: RailInstruction[] = [];

  async initiateTransfer(
    instruction: RailInstruction,
    options: { readonly signal: AbortSignal },
  ): Promise<RailResult> {
    if (options.signal.aborted) {
      return { ok: false, error: "Transfer aborted before submission" };
    }
    this.instructions.push(instruction);

    const transactionHash = `0x${randomBytes(32).toString("hex")}`;
    if (instruction.kind === "subscription") {
      return {
        ok: true,
        transactionHash,
        status: "active",
        subscriptionId: `sim_sub_${randomBytes(8).toString("hex")}`,
      };
    }
    return { ok: true, transactionHash, status: "confirmed" };
  }
}
