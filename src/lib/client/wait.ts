import {
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
  type Hex,
  type PublicClient,
  type TransactionReceipt,
} from "viem";

import { logger } from "@/logger.js";

export type InclusionResult =
  | { status: "included"; receipt: TransactionReceipt }
  | { status: "dropped" }
  | { status: "timeout" }
  | { status: "cancelled" };

export type WaitForInclusionOptions = {
  hash: Hex;
  confirmations: number;
  /** Milliseconds, `Infinity` to wait until the transaction is included or dropped */
  timeout: number;
  pollingInterval: number;
  signal?: AbortSignal;
};

/**
 * Waits until a transaction is included with enough confirmations, or is known to be dropped.
 *
 * Instead of sleeping in a loop, this suspends on the client's block number watcher (one shared poller per client and
 * interval) and checks the receipt once per new block; any number of waits can be pending without holding anything
 * but a subscription. Transient request failures are logged and the wait goes on, since they say nothing about the
 * transaction.
 *
 * Cancelling or timing out only stops the wait; the transaction may still be included later.
 */
export const waitForInclusion = (client: PublicClient, options: WaitForInclusionOptions): Promise<InclusionResult> => {
  const { hash, confirmations, timeout, pollingInterval, signal } = options;

  return new Promise((resolve) => {
    if (signal?.aborted) return resolve({ status: "cancelled" });

    let settled = false;
    let unwatch: (() => void) | undefined;
    let timer: NodeJS.Timeout | undefined;

    const onAbort = () => finish({ status: "cancelled" });

    const finish = (result: InclusionResult) => {
      if (settled) return;
      settled = true;
      unwatch?.();
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      logger.log(`Stopped waiting for ${hash}: ${result.status}`);
      resolve(result);
    };

    const check = async (blockNumber: bigint) => {
      if (settled) return;

      const receipt = await getReceipt(client, hash);
      if (receipt) {
        const depth = blockNumber - receipt.blockNumber + 1n;
        if (depth >= BigInt(confirmations)) finish({ status: "included", receipt });
        return;
      }

      // No receipt: still pending if the node knows the transaction, dropped otherwise
      const known = await isKnown(client, hash);
      if (!known) finish({ status: "dropped" });
    };

    const onCheckError = (error: unknown) =>
      logger.error(`Error while checking ${hash}: ${error instanceof Error ? error.message : String(error)}`);

    signal?.addEventListener("abort", onAbort);
    if (Number.isFinite(timeout)) timer = setTimeout(() => finish({ status: "timeout" }), timeout);

    // Check once right away: the shared watcher only reports blocks newer than the ones it has already seen
    client
      .getBlockNumber({ cacheTime: 0 })
      .then(check)
      .catch(onCheckError);

    unwatch = client.watchBlockNumber({
      poll: true,
      pollingInterval,
      onBlockNumber: (blockNumber) => {
        check(blockNumber).catch(onCheckError);
      },
      onError: onCheckError,
    });
    // The initial check or the abort listener may already have settled the wait
    if (settled) unwatch();
  });
};

const getReceipt = async (client: PublicClient, hash: Hex): Promise<TransactionReceipt | undefined> => {
  try {
    return await client.getTransactionReceipt({ hash });
  } catch (error) {
    if (error instanceof TransactionReceiptNotFoundError) return undefined;
    throw error;
  }
};

const isKnown = async (client: PublicClient, hash: Hex): Promise<boolean> => {
  try {
    await client.getTransaction({ hash });
    return true;
  } catch (error) {
    if (error instanceof TransactionNotFoundError) return false;
    throw error;
  }
};
