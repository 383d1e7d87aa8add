import type { Hex } from "viem";

import type { LedgerError } from "@/lib/ledger/types.js";

/** Why a transaction reverted: a decoded ledger rule, or raw revert data we could not map. */
export type RevertReason = LedgerError | { type: "Reverted"; data: Hex; message?: string };

/** The node could not be reached; the outcome of the request is unknown. */
export type NetworkFailure = { type: "NetworkFailure"; message: string };

/**
 * Failure before a transaction was accepted by the node.
 *
 * - `NetworkFailure`: transport-level, safe to retry with a freshly built intent
 * - `InvalidNonce`: the node refused the nonce (stale, duplicate or replaced); a sequencing bug in the caller
 * - `Rejected`: any other node-side refusal (chain id, fees, funds)
 * - `PredictedRevert`: the pre-send simulation reverted, nothing was broadcast
 */
export type SubmissionError =
  | NetworkFailure
  | { type: "InvalidNonce"; nonce: number; message: string }
  | { type: "Rejected"; message: string }
  | { type: "PredictedRevert"; reason: RevertReason };

export const describeError = (error: SubmissionError | RevertReason): string => {
  switch (error.type) {
    case "InsufficientBalance":
      return `insufficient balance: ${error.account} has ${error.balance}, needs ${error.needed}`;
    case "InsufficientAllowance":
      return `insufficient allowance: ${error.spender} may spend ${error.allowance} of ${error.owner}, needs ${error.needed}`;
    case "ArithmeticOverflow":
      return "arithmetic overflow";
    case "Reverted":
      return error.message ? `reverted: ${error.message}` : `reverted with data ${error.data}`;
    case "NetworkFailure":
      return `network failure: ${error.message}`;
    case "InvalidNonce":
      return `invalid nonce ${error.nonce}: ${error.message}`;
    case "Rejected":
      return `rejected: ${error.message}`;
    case "PredictedRevert":
      return `simulation reverted (${describeError(error.reason)})`;
  }
};
