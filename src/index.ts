export { TokenClient } from "@/lib/client/index.js";
export { PendingTransaction } from "@/lib/client/pending.js";
export { NonceManager } from "@/lib/client/nonce.js";
export { KeyedMutex } from "@/lib/client/mutex.js";
export type {
  // Intents
  TokenIntent,
  IntentCall,
  // Stages
  BuiltTransaction,
  SignedTransaction,
  // Fees
  FeeModel,
  FeeParams,
  BuildOverrides,
  // Outcomes
  WaitOutcome,
  TxOutcome,
  WaitOptions,
  SendOptions,
  // Options
  TokenClientOptions,
  SupplyAudit,
} from "@/lib/client/types.js";

export { TokenLedger } from "@/lib/ledger/index.js";
export { AddressMap } from "@/lib/ledger/address-map.js";
export type { TokenMetadata, GenesisOptions, LedgerEvent, LedgerError } from "@/lib/ledger/types.js";

export { LedgerNode, createNodeTransport, applyTokenCall, intrinsicGas, DEFAULT_CHAIN_ID, DEFAULT_TOKEN_ADDRESS } from "@/lib/node/index.js";
export { NodeRpcError, RPC_ERROR } from "@/lib/node/errors.js";
export type { LedgerNodeOptions } from "@/lib/node/types.js";

export { encodeIntent, encodeRevert, decodeRevert, eventsFromLogs } from "@/lib/codec.js";
export { tokenAbi, tokenErrorsAbi } from "@/lib/abi.js";
export { describeError } from "@/lib/errors.js";
export type { RevertReason, NetworkFailure, SubmissionError } from "@/lib/errors.js";
export { parseConfig, configFromEnv } from "@/lib/config.js";
export type { TokenClientConfig, EnvConfig } from "@/lib/config.js";
export { MAX_AMOUNT, isAmount, type Amount } from "@/lib/amount.js";
export { ok, err, type Result } from "@/lib/result.js";
export { createClient } from "@/lib/utils.js";
