import type { Address } from "viem";

import type { Amount } from "@/lib/amount.js";

/** Immutable token description fixed at genesis. */
export type TokenMetadata = {
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: Amount;
};

/**
 * Genesis parameters: the whole supply is minted to `holder` before any other transition.
 *
 * @example
 *   const genesis: GenesisOptions = {
 *     name: "MyToken",
 *     symbol: "MTK",
 *     decimals: 18,
 *     totalSupply: parseUnits("1000000", 18),
 *     holder: "0x123...",
 *   };
 */
export type GenesisOptions = TokenMetadata & { holder: Address };

/** Event emitted by a successful transition, shaped like the decoded ERC20 log. */
export type LedgerEvent =
  | { eventName: "Transfer"; args: { from: Address; to: Address; value: Amount } }
  | { eventName: "Approval"; args: { owner: Address; spender: Address; value: Amount } };

/** Business-rule failure of a transition; the ledger is left unchanged. */
export type LedgerError =
  | { type: "InsufficientBalance"; account: Address; balance: Amount; needed: Amount }
  | { type: "InsufficientAllowance"; owner: Address; spender: Address; allowance: Amount; needed: Amount }
  | { type: "ArithmeticOverflow" };
