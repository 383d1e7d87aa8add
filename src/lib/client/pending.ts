import type { Hex } from "viem";

import type { SignedTransaction, WaitOptions, WaitOutcome } from "@/lib/client/types.js";

type Waiter = (pending: PendingTransaction, options?: WaitOptions) => Promise<WaitOutcome>;

/**
 * Handle on a broadcast transaction.
 *
 * Broadcasting is irrevocable: a timed out or cancelled wait leaves the handle pending and it can be waited on again.
 * Once the transaction is confirmed, reverted or dropped, the outcome is kept and returned by every later wait.
 */
export class PendingTransaction {
  readonly stage = "broadcast";
  private settled: WaitOutcome | undefined;

  constructor(
    private readonly waiter: Waiter,
    readonly hash: Hex,
    /** The signed transaction, when the handle was created by this client rather than attached by hash */
    readonly transaction?: SignedTransaction,
  ) {}

  get outcome(): WaitOutcome | undefined {
    return this.settled;
  }

  settle(outcome: WaitOutcome): void {
    if (outcome.status === "timeout" || outcome.status === "cancelled") return;
    this.settled ??= outcome;
  }

  wait(options?: WaitOptions): Promise<WaitOutcome> {
    return this.waiter(this, options);
  }
}
