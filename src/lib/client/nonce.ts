import { getAddress, type Address } from "viem";

import { KeyedMutex } from "@/lib/client/mutex.js";
import { AddressMap } from "@/lib/ledger/address-map.js";
import { logger } from "@/logger.js";

type AccountNonces = {
  /** One past the highest nonce handed out */
  next: number;
  /** Handed out to a build that has not reached the node yet */
  held: Set<number>;
  /** Released below `next`, reused before `next` advances */
  free: Array<number>;
};

/**
 * Hands out nonces per account.
 *
 * Acquisition is a critical section per account: the node's pending nonce is fetched fresh and merged with the local
 * state, so two intents built concurrently for the same account never get the same nonce, even before either one
 * reached the node.
 *
 * A nonce that will never be used (failed broadcast, dropped transaction) is {@link NonceManager.release | released}:
 * the counter only steps back when it was the highest one handed out, otherwise the nonce waits in a free list and the
 * next acquisition fills that gap first.
 */
export class NonceManager {
  private readonly accounts = new AddressMap<AccountNonces>();
  private readonly mutex = new KeyedMutex();

  constructor(private readonly fetchNonce: (address: Address) => Promise<number>) {}

  async acquire(address: Address): Promise<number> {
    return this.mutex.runExclusive(getAddress(address), async () => {
      const remote = await this.fetchNonce(address);
      const state: AccountNonces = this.accounts.get(address) ?? { next: remote, held: new Set(), free: [] };

      // Gaps the node has filled since (another process, or a broadcast that went through after all)
      state.free = state.free.filter((nonce) => nonce >= remote).sort((a, b) => a - b);
      const nonce = state.free.shift() ?? Math.max(state.next, remote);
      if (nonce >= state.next) state.next = nonce + 1;
      state.held.add(nonce);
      this.accounts.set(address, state);

      logger.log(`Acquired nonce ${nonce} for ${address} (node: ${remote}, next: ${state.next})`);
      return nonce;
    });
  }

  /** The nonce reached the node; it is now covered by the node's pending count. */
  async commit(address: Address, nonce: number): Promise<void> {
    await this.mutex.runExclusive(getAddress(address), async () => {
      this.accounts.get(address)?.held.delete(nonce);
    });
  }

  /**
   * Gives back a nonce that will not be used.
   *
   * When nothing is held or free anymore, the local state is forgotten and the next acquisition trusts the node.
   */
  async release(address: Address, nonce: number): Promise<void> {
    await this.mutex.runExclusive(getAddress(address), async () => {
      const state = this.accounts.get(address);
      if (!state || nonce >= state.next) return;

      state.held.delete(nonce);
      if (nonce === state.next - 1) {
        state.next = nonce;
        while (state.free.includes(state.next - 1)) {
          state.free = state.free.filter((free) => free !== state.next - 1);
          state.next--;
        }
      } else if (!state.free.includes(nonce)) {
        state.free.push(nonce);
      }

      if (state.held.size === 0 && state.free.length === 0) this.accounts.delete(address);
      logger.log(`Released nonce ${nonce} for ${address}`);
    });
  }

  /** Next nonce the manager would hand out without asking the node, if it tracks one */
  peek(address: Address): number | undefined {
    const state = this.accounts.get(address);
    if (!state) return undefined;
    return state.free.length > 0 ? Math.min(...state.free) : state.next;
  }
}
