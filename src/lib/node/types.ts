import type { Address, Hex } from "viem";

import type { FeeParams } from "@/lib/client/types.js";
import type { TokenLedger } from "@/lib/ledger/index.js";
import type { GenesisOptions } from "@/lib/ledger/types.js";

/**
 * Options for an in-process ledger node.
 *
 * @example
 *   const node = new LedgerNode({
 *     token: { name: "MyToken", symbol: "MTK", decimals: 18, totalSupply, holder: owner },
 *     accounts: { [owner]: parseEther("10") },
 *     mining: { type: "manual" },
 *   });
 */
export type LedgerNodeOptions = {
  /** Chain id transactions must be signed for (default: 31337) */
  chainId?: number;
  /** Token genesis, and the address the token lives at */
  token: GenesisOptions & { address?: Address };
  /** Initial native balances, used to pay for gas */
  accounts?: Record<Address, bigint>;
  /**
   * Mining mode (default: auto)
   *
   * - `auto`: every executable transaction is mined in its own block as soon as it is submitted
   * - `manual`: transactions wait in the pool until {@link LedgerNode.mine} is called
   */
  mining?: { type: "auto" } | { type: "manual" };
  /** Base fee per gas; the minimum legacy gas price and the floor of an EIP-1559 fee cap (default: 1 gwei) */
  baseFeePerGas?: bigint;
  /** Block gas limit (default: 30M) */
  blockGasLimit?: bigint;
};

/** A transaction accepted by the node, pending or mined. */
export type StoredTransaction = {
  hash: Hex;
  from: Address;
  to: Address;
  nonce: number;
  gas: bigint;
  value: bigint;
  data: Hex;
  fees: FeeParams;
  chainId: number;
  signature: { r: Hex; s: Hex; v: bigint; yParity: number };
  /** Arrival order in the pool */
  seq: number;
  /** Set once mined */
  block?: {
    number: bigint;
    hash: Hex;
    index: number;
    effectiveGasPrice: bigint;
    gasUsed: bigint;
    /** Return data, or revert data when `reverted` */
    output: Hex;
    reverted: boolean;
  };
};

export type BlockRecord = {
  number: bigint;
  hash: Hex;
  parentHash: Hex;
  timestamp: bigint;
  gasUsed: bigint;
  transactions: Array<Hex>;
  /** Token state at the end of the block */
  ledger: TokenLedger;
};

/* ------------------------------ RPC SHAPES ------------------------------ */
export type RpcLogJson = {
  address: Address;
  topics: Array<Hex>;
  data: Hex;
  blockNumber: Hex;
  blockHash: Hex;
  transactionHash: Hex;
  transactionIndex: Hex;
  logIndex: Hex;
  removed: false;
};

export type RpcReceiptJson = {
  transactionHash: Hex;
  transactionIndex: Hex;
  blockHash: Hex;
  blockNumber: Hex;
  from: Address;
  to: Address;
  cumulativeGasUsed: Hex;
  gasUsed: Hex;
  effectiveGasPrice: Hex;
  contractAddress: null;
  logs: Array<RpcLogJson>;
  logsBloom: Hex;
  status: "0x1" | "0x0";
  type: "0x0" | "0x2";
};

export type CallTraceJson = {
  type: "CALL";
  from: Address;
  to: Address;
  value: Hex;
  gas: Hex;
  gasUsed: Hex;
  input: Hex;
  output: Hex;
  error?: string;
};

export type CallRequest = { from?: Address; to?: Address; data: Hex; value: bigint };
