import type { Address, Hex, LocalAccount, PublicClient, TransactionReceipt, Transport } from "viem";

import type { Amount } from "@/lib/amount.js";
import type { TokenClientConfig } from "@/lib/config.js";
import type { RevertReason, SubmissionError } from "@/lib/errors.js";
import type { LedgerEvent } from "@/lib/ledger/types.js";

/* -------------------------------------------------------------------------- */
/*                                   INTENTS                                  */
/* -------------------------------------------------------------------------- */

/**
 * A desired ledger transition, before it is bound to a nonce.
 *
 * `native` moves the chain's native currency (e.g. to fund an account for gas) and does not touch the token.
 */
export type TokenIntent =
  | { type: "transfer"; to: Address; amount: Amount }
  | { type: "approve"; spender: Address; amount: Amount }
  | { type: "transferFrom"; from: Address; to: Address; amount: Amount }
  | { type: "native"; to: Address; value: bigint };

/** Encoded call for an intent. */
export type IntentCall = { to: Address; data: Hex; value: bigint };

/* -------------------------------------------------------------------------- */
/*                                    FEES                                    */
/* -------------------------------------------------------------------------- */

export type FeeModel = "legacy" | "eip1559";

export type FeeParams =
  | { type: "legacy"; gasPrice: bigint }
  | { type: "eip1559"; maxFeePerGas: bigint; maxPriorityFeePerGas: bigint };

/** Per-transaction overrides; anything left out is filled from the config or the node. */
export type BuildOverrides = {
  gas?: bigint;
  feeModel?: FeeModel;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
};

/* -------------------------------------------------------------------------- */
/*                                   STAGES                                   */
/* -------------------------------------------------------------------------- */

/** Intent bound to a nonce, fees and chain; it is never rebuilt with another nonce. */
export type BuiltTransaction = {
  stage: "built";
  from: Address;
  nonce: number;
  chainId: number;
  intent: TokenIntent;
  call: IntentCall;
  gas: bigint;
  fees: FeeParams;
};

export type SignedTransaction = Omit<BuiltTransaction, "stage"> & {
  stage: "signed";
  /** keccak256 of the serialized transaction */
  hash: Hex;
  serialized: Hex;
};

/* -------------------------------------------------------------------------- */
/*                                  OUTCOMES                                  */
/* -------------------------------------------------------------------------- */

/**
 * Terminal or interim result of waiting on a broadcast transaction.
 *
 * `timeout` and `cancelled` are not terminal: the transaction may still be included later, and the same handle can be
 * waited on again.
 */
export type WaitOutcome =
  | { status: "confirmed"; hash: Hex; receipt: TransactionReceipt; events: Array<LedgerEvent> }
  | { status: "reverted"; hash: Hex; receipt: TransactionReceipt; reason: RevertReason }
  | { status: "dropped"; hash: Hex }
  | { status: "timeout"; hash: Hex }
  | { status: "cancelled"; hash: Hex };

/** Result of the whole pipeline for one intent. */
export type TxOutcome = WaitOutcome | { status: "failed"; error: SubmissionError };

export type WaitOptions = {
  /** Maximum time to wait in milliseconds (`-1` to wait forever; defaults to the client config) */
  timeout?: number;
  /** Stops waiting when aborted; the transaction itself is not affected */
  signal?: AbortSignal;
  /** Number of blocks including the transaction's own (defaults to the client config) */
  confirmations?: number;
};

export type SendOptions = BuildOverrides &
  WaitOptions & {
    /** Run a call-only simulation first and fail fast on a predicted revert */
    simulate?: boolean;
  };

/* -------------------------------------------------------------------------- */
/*                                   CLIENT                                   */
/* -------------------------------------------------------------------------- */

/**
 * Options for creating a {@link TokenClient}.
 *
 * Note: You will need to provide either a public client, a transport or a JSON-RPC URL, and either a local account or a
 * private key.
 */
export type TokenClientOptions = {
  /** Address of the token contract */
  token: Address;
  /** An existing public client to use for all requests */
  client?: PublicClient;
  /** Transport for creating a public client (e.g. a {@link createNodeTransport} for an in-process node) */
  transport?: Transport;
  /** JSON-RPC URL for creating a public client */
  rpcUrl?: string;
  /** Chain id to sign for (fetched from the node when omitted) */
  chainId?: number;
  /** Signer */
  account?: LocalAccount;
  /** Private key of the signer, when no account is provided */
  privateKey?: Hex;
  config?: TokenClientConfig;
};

/** Result of comparing the balances of a set of holders with the total supply. */
export type SupplyAudit = {
  totalSupply: Amount;
  balances: Record<Address, Amount>;
  sum: Amount;
  consistent: boolean;
};
