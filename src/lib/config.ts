import type { FeeModel } from "@/lib/client/types.js";

/** Default interval between block number polls, in milliseconds */
const DEFAULT_POLLING_INTERVAL = 1_000;

/** Default maximum time to wait for a confirmation, in milliseconds */
const DEFAULT_CONFIRMATION_TIMEOUT = 60_000;

/** Default number of blocks (including the inclusion block) before a transaction counts as confirmed */
const DEFAULT_CONFIRMATIONS = 1;

/** Default gas limit for token calls */
const DEFAULT_GAS_LIMIT = 300_000n;

export interface TokenClientConfig {
  /**
   * Optional interval between block number polls while waiting for a confirmation.
   *
   * Default {@link DEFAULT_POLLING_INTERVAL}
   */
  pollingInterval?: number;
  /**
   * Optional maximum time to wait for a confirmation.
   *
   * Set to `-1` to wait until the transaction is included or dropped.
   *
   * Default {@link DEFAULT_CONFIRMATION_TIMEOUT}
   */
  timeout?: number;
  /**
   * Optional number of blocks, including the inclusion block, before a transaction counts as confirmed.
   *
   * Default {@link DEFAULT_CONFIRMATIONS}
   */
  confirmations?: number;
  /**
   * Optional gas limit attached to every transaction.
   *
   * Default {@link DEFAULT_GAS_LIMIT}
   */
  gasLimit?: bigint;
  /**
   * Optional fee model; `legacy` uses a single gas price, `eip1559` a fee cap and a tip.
   *
   * Default `legacy`
   */
  feeModel?: FeeModel;
  /**
   * Whether to simulate every intent before broadcasting it.
   *
   * Default `false`
   */
  simulate?: boolean;
}

export const parseConfig = (config?: TokenClientConfig): Required<TokenClientConfig> => {
  const parsed = {
    pollingInterval: config?.pollingInterval ?? DEFAULT_POLLING_INTERVAL,
    timeout: config?.timeout === -1 ? Infinity : (config?.timeout ?? DEFAULT_CONFIRMATION_TIMEOUT),
    confirmations: config?.confirmations ?? DEFAULT_CONFIRMATIONS,
    gasLimit: config?.gasLimit ?? DEFAULT_GAS_LIMIT,
    feeModel: config?.feeModel ?? "legacy",
    simulate: config?.simulate ?? false,
  };

  if (!(parsed.pollingInterval > 0)) throw new RangeError(`pollingInterval must be positive, got ${parsed.pollingInterval}`);
  if (!(parsed.timeout > 0)) throw new RangeError(`timeout must be positive or -1, got ${parsed.timeout}`);
  if (!Number.isInteger(parsed.confirmations) || parsed.confirmations < 1)
    throw new RangeError(`confirmations must be a positive integer, got ${parsed.confirmations}`);
  if (parsed.gasLimit <= 0n) throw new RangeError(`gasLimit must be positive, got ${parsed.gasLimit}`);

  return parsed;
};

/** Connection settings and client config read from the environment. */
export type EnvConfig = { rpcUrl?: string; chainId?: number; config: TokenClientConfig };

/**
 * Reads `TOKENFLOW_*` variables.
 *
 * - `TOKENFLOW_RPC_URL`, `TOKENFLOW_CHAIN_ID`
 * - `TOKENFLOW_POLLING_INTERVAL`, `TOKENFLOW_TIMEOUT`, `TOKENFLOW_CONFIRMATIONS`, `TOKENFLOW_GAS_LIMIT`
 * - `TOKENFLOW_FEE_MODEL` (`legacy` | `eip1559`), `TOKENFLOW_SIMULATE` (`true` | `false`)
 */
export const configFromEnv = (env: NodeJS.ProcessEnv = process.env): EnvConfig => {
  const config: TokenClientConfig = {};

  const pollingInterval = readInteger(env, "TOKENFLOW_POLLING_INTERVAL");
  if (pollingInterval !== undefined) config.pollingInterval = pollingInterval;
  const timeout = readInteger(env, "TOKENFLOW_TIMEOUT");
  if (timeout !== undefined) config.timeout = timeout;
  const confirmations = readInteger(env, "TOKENFLOW_CONFIRMATIONS");
  if (confirmations !== undefined) config.confirmations = confirmations;
  const gasLimit = readInteger(env, "TOKENFLOW_GAS_LIMIT");
  if (gasLimit !== undefined) config.gasLimit = BigInt(gasLimit);

  const feeModel = env.TOKENFLOW_FEE_MODEL;
  if (feeModel === "legacy" || feeModel === "eip1559") config.feeModel = feeModel;
  else if (feeModel) throw new Error(`TOKENFLOW_FEE_MODEL must be "legacy" or "eip1559", got "${feeModel}"`);

  const simulate = env.TOKENFLOW_SIMULATE;
  if (simulate === "true" || simulate === "false") config.simulate = simulate === "true";
  else if (simulate) throw new Error(`TOKENFLOW_SIMULATE must be "true" or "false", got "${simulate}"`);

  return {
    rpcUrl: env.TOKENFLOW_RPC_URL || undefined,
    chainId: readInteger(env, "TOKENFLOW_CHAIN_ID"),
    config,
  };
};

const readInteger = (env: NodeJS.ProcessEnv, name: string): number | undefined => {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;

  const value = Number(raw);
  if (!Number.isSafeInteger(value)) throw new Error(`${name} must be an integer, got "${raw}"`);
  return value;
};
