import { custom, HttpRequestError, type LocalAccount, type Transport } from "viem";

import { ACCOUNTS, NATIVE_BALANCE, TEST_CONFIG, TOKEN } from "@test/constants.js";
import { TokenClient } from "@/lib/client/index.js";
import type { TokenClientConfig } from "@/lib/config.js";
import { createNodeTransport, LedgerNode } from "@/lib/node/index.js";

let current: LedgerNode | undefined;

/** Creates a node with the whole supply minted to the owner, and gas money for everyone but `broke`. */
export const createNode = (options?: { mining?: "auto" | "manual" }): LedgerNode =>
  new LedgerNode({
    token: { ...TOKEN, holder: ACCOUNTS.owner.address },
    accounts: {
      [ACCOUNTS.owner.address]: NATIVE_BALANCE,
      [ACCOUNTS.recipient.address]: NATIVE_BALANCE,
      [ACCOUNTS.spender.address]: NATIVE_BALANCE,
    },
    mining: { type: options?.mining ?? "auto" },
  });

export const setNode = (node: LedgerNode): void => {
  current = node;
};

/** Node created fresh before each test */
export const getNode = (): LedgerNode => {
  if (!current) throw new Error("No node, is the setup file registered?");
  return current;
};

export const getTokenClient = (
  account: LocalAccount = ACCOUNTS.owner,
  options?: { transport?: Transport; chainId?: number; config?: TokenClientConfig },
): TokenClient => {
  const node = getNode();
  return new TokenClient({
    token: node.tokenAddress,
    transport: options?.transport ?? createNodeTransport(node),
    chainId: options?.chainId,
    account,
    config: { ...TEST_CONFIG, ...options?.config },
  });
};

/**
 * Transport answered by the node, except for the listed methods which fail as if the node was unreachable.
 *
 * With `times`, only the first `times` calls to those methods fail.
 */
export const createFlakyTransport = (node: LedgerNode, failing: Array<string>, times = Infinity): Transport => {
  let remaining = times;
  return custom(
    {
      request: async ({ method, params }: { method: string; params?: unknown }) => {
        if (failing.includes(method) && remaining > 0) {
          remaining--;
          throw new HttpRequestError({ url: "http://localhost:8545", details: "connect ECONNREFUSED" });
        }
        return node.request({ method, params });
      },
    },
    { retryCount: 0 },
  );
};
