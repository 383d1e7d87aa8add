import {
  decodeFunctionData,
  erc20Abi,
  getAddress,
  isHex,
  keccak256,
  type Address,
  type Hex,
  type LocalAccount,
  type PublicClient,
  type TransactionReceipt,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { sendRawTransaction } from "viem/actions";

import { tokenAbi } from "@/lib/abi.js";
import { addAmounts, assertAmount, type Amount } from "@/lib/amount.js";
import {
  classifySubmissionError,
  isNetworkError,
  messageOf,
  revertReasonOf,
  toNetworkFailure,
} from "@/lib/client/errors.js";
import { NonceManager } from "@/lib/client/nonce.js";
import { PendingTransaction } from "@/lib/client/pending.js";
import type {
  BuildOverrides,
  BuiltTransaction,
  FeeParams,
  SendOptions,
  SignedTransaction,
  SupplyAudit,
  TokenClientOptions,
  TokenIntent,
  TxOutcome,
  WaitOptions,
  WaitOutcome,
} from "@/lib/client/types.js";
import { waitForInclusion } from "@/lib/client/wait.js";
import { decodeRevert, encodeIntent, eventsFromLogs } from "@/lib/codec.js";
import { parseConfig, type TokenClientConfig } from "@/lib/config.js";
import type { NetworkFailure, RevertReason, SubmissionError } from "@/lib/errors.js";
import type { TokenMetadata } from "@/lib/ledger/types.js";
import { err, ok, type Result } from "@/lib/result.js";
import { createClient } from "@/lib/utils.js";
import { logger } from "@/logger.js";

/**
 * Drives token intents through build → sign → broadcast → confirm for a single signer.
 *
 * Reads (`balanceOf`, `allowance`, `metadata`) go straight to the node's latest state. Writes acquire the signer's next
 * nonce in a critical section, are signed locally for the node's chain id, broadcast once, and resolve to a typed
 * outcome; the client never resubmits a transaction, and never retries a failed submission under a new nonce.
 *
 * @example
 *   const token = new TokenClient({ token: "0x5FbD...", rpcUrl: "http://localhost:8545", privateKey });
 *   const outcome = await token.transfer(recipient, 100n);
 *   if (outcome.status === "reverted") console.log(outcome.reason.type); // e.g. "InsufficientBalance"
 */
export class TokenClient {
  readonly token: Address;
  readonly account: LocalAccount;
  readonly client: PublicClient;
  readonly config: Required<TokenClientConfig>;
  readonly nonces: NonceManager;

  private chainId: number | undefined;
  private readonly pending = new Map<Hex, PendingTransaction>();

  constructor(options: TokenClientOptions & { nonces?: NonceManager }) {
    this.config = parseConfig(options.config);
    this.client =
      options.client ??
      createClient({ transport: options.transport, rpcUrl: options.rpcUrl, pollingInterval: this.config.pollingInterval });

    const account = options.account ?? (options.privateKey ? privateKeyToAccount(options.privateKey) : undefined);
    if (!account) throw new Error("You need to provide an account or a private key");
    this.account = account;

    this.token = getAddress(options.token);
    this.chainId = options.chainId;
    // A manager can be shared by several clients signing for the same account
    this.nonces =
      options.nonces ?? new NonceManager((address) => this.client.getTransactionCount({ address, blockTag: "pending" }));

    // Bind 'this' for the waiter passed to pending handles
    this.wait = this.wait.bind(this);
  }

  /** Address of the signer */
  get address(): Address {
    return this.account.address;
  }

  /* -------------------------------------------------------------------------- */
  /*                                    READS                                   */
  /* -------------------------------------------------------------------------- */

  async balanceOf(account: Address): Promise<Amount> {
    return this.client.readContract({ address: this.token, abi: tokenAbi, functionName: "balanceOf", args: [account] });
  }

  async allowance(owner: Address, spender: Address): Promise<Amount> {
    return this.client.readContract({
      address: this.token,
      abi: tokenAbi,
      functionName: "allowance",
      args: [owner, spender],
    });
  }

  async metadata(): Promise<TokenMetadata> {
    const [name, symbol, decimals, totalSupply] = await Promise.all([
      this.client.readContract({ address: this.token, abi: tokenAbi, functionName: "name" }),
      this.client.readContract({ address: this.token, abi: tokenAbi, functionName: "symbol" }),
      this.client.readContract({ address: this.token, abi: tokenAbi, functionName: "decimals" }),
      this.client.readContract({ address: this.token, abi: tokenAbi, functionName: "totalSupply" }),
    ]);
    return { name, symbol, decimals, totalSupply };
  }

  /** Native currency balance, used to pay for gas */
  async nativeBalance(account: Address = this.address): Promise<bigint> {
    return this.client.getBalance({ address: account });
  }

  /** Reads the total supply and the balances of `holders`, and checks that they add up. */
  async auditSupply(holders: Array<Address>): Promise<SupplyAudit> {
    const unique = [...new Set(holders.map((holder) => getAddress(holder)))];
    const [totalSupply, ...balances] = await Promise.all([
      this.client.readContract({ address: this.token, abi: tokenAbi, functionName: "totalSupply" }),
      ...unique.map((holder) => this.balanceOf(holder)),
    ]);

    const sum = balances.reduce((acc, balance) => acc + balance, 0n);
    return {
      totalSupply,
      balances: Object.fromEntries(unique.map((holder, i) => [holder, balances[i] ?? 0n])),
      sum,
      consistent: sum === totalSupply,
    };
  }

  /* -------------------------------------------------------------------------- */
  /*                                  PIPELINE                                  */
  /* -------------------------------------------------------------------------- */

  /**
   * Binds an intent to the signer's next nonce, a gas limit, fees and the chain id.
   *
   * Fees are resolved before the nonce is taken, so a failure here never consumes a nonce.
   */
  async build(intent: TokenIntent, overrides: BuildOverrides = {}): Promise<Result<BuiltTransaction, SubmissionError>> {
    assertAmount(intent.type === "native" ? intent.value : intent.amount);
    const call = encodeIntent(this.token, intent);

    try {
      const chainId = await this.getChainId();
      const fees = await this.resolveFees(overrides);
      const nonce = await this.nonces.acquire(this.address);

      logger.log(`Built ${intent.type} from ${this.address} with nonce ${nonce}`);
      return ok({
        stage: "built",
        from: this.address,
        nonce,
        chainId,
        intent,
        call,
        gas: overrides.gas ?? this.config.gasLimit,
        fees,
      });
    } catch (error) {
      if (isNetworkError(error)) return err(toNetworkFailure(error));
      return err({ type: "Rejected", message: messageOf(error) ?? String(error) });
    }
  }

  /** Signs the built transaction; the signature covers payload, nonce, fees and chain id. */
  async sign(built: BuiltTransaction): Promise<SignedTransaction> {
    const { call, fees, gas, nonce, chainId } = built;
    const serialized = await this.account.signTransaction(
      fees.type === "legacy"
        ? { type: "legacy", chainId, nonce, gas, gasPrice: fees.gasPrice, ...call }
        : {
            type: "eip1559",
            chainId,
            nonce,
            gas,
            maxFeePerGas: fees.maxFeePerGas,
            maxPriorityFeePerGas: fees.maxPriorityFeePerGas,
            ...call,
          },
    );

    const hash = keccak256(serialized);
    logger.log(`Signed ${hash} (nonce ${nonce}, chain ${chainId})`);
    return { ...built, stage: "signed", hash, serialized };
  }

  /**
   * Submits the signed transaction once.
   *
   * On failure the nonce is released, so a later build fills it instead of leaving a gap; the caller decides whether to
   * build a new intent.
   *
   * The transaction is tracked under the hash the node returns.
   */
  async broadcast(signed: SignedTransaction): Promise<Result<PendingTransaction, SubmissionError>> {
    let returned: Hex;
    try {
      returned = await sendRawTransaction(this.client, { serializedTransaction: signed.serialized });
    } catch (error) {
      const failure = classifySubmissionError(error, signed.nonce);
      logger.error(`Failed to broadcast ${signed.hash}: ${failure.type}`);
      await this.nonces.release(signed.from, signed.nonce);
      return err(failure);
    }

    await this.nonces.commit(signed.from, signed.nonce);
    const hash = returned.toLowerCase() === signed.hash.toLowerCase() ? signed.hash : returned;
    if (hash !== signed.hash) logger.error(`Node returned hash ${hash} for ${signed.hash}`);

    const pending = new PendingTransaction(this.wait, hash, signed);
    this.pending.set(hash, pending);
    logger.log(`Broadcast ${hash}`);
    return ok(pending);
  }

  /**
   * Waits for a broadcast transaction to be confirmed, revert, or be dropped.
   *
   * A `timeout` or `cancelled` outcome only ends this wait; call again (or {@link attach} the hash) to resume.
   */
  async wait(transaction: PendingTransaction | Hex, options: WaitOptions = {}): Promise<WaitOutcome> {
    const pending = typeof transaction === "string" ? this.attach(transaction) : transaction;
    if (pending.outcome) return pending.outcome;

    const { hash } = pending;
    const result = await waitForInclusion(this.client, {
      hash,
      confirmations: options.confirmations ?? this.config.confirmations,
      timeout: options.timeout === -1 ? Infinity : (options.timeout ?? this.config.timeout),
      pollingInterval: this.config.pollingInterval,
      signal: options.signal,
    });

    if (result.status === "timeout" || result.status === "cancelled") return { status: result.status, hash };

    const outcome: WaitOutcome =
      result.status === "dropped" ? { status: "dropped", hash } : await this.outcomeOf(result.receipt);
    pending.settle(outcome);
    this.pending.delete(hash);
    // A dropped transaction leaves its nonce unused
    if (outcome.status === "dropped" && pending.transaction)
      await this.nonces.release(pending.transaction.from, pending.transaction.nonce);
    logger.log(`${hash} ${outcome.status}`);
    return outcome;
  }

  /** Returns the handle for a transaction broadcast earlier (by this client or another process). */
  attach(hash: Hex): PendingTransaction {
    const existing = this.pending.get(hash);
    if (existing) return existing;

    const pending = new PendingTransaction(this.wait, hash);
    this.pending.set(hash, pending);
    return pending;
  }

  /** Handles broadcast by this client that have not been confirmed, reverted or dropped yet */
  pendingTransactions(): Array<PendingTransaction> {
    return [...this.pending.values()];
  }

  /**
   * Executes the intent as a call against the latest state.
   *
   * The result is advisory: the state can change before the transaction is included.
   */
  async simulate(intent: TokenIntent): Promise<Result<void, RevertReason | NetworkFailure>> {
    const call = encodeIntent(this.token, intent);
    try {
      await this.client.call({ account: this.address, ...call });
      return ok(undefined);
    } catch (error) {
      if (isNetworkError(error)) return err(toNetworkFailure(error));
      const reason = revertReasonOf(error, { owner: intent.type === "transferFrom" ? intent.from : undefined });
      if (reason) return err(reason);
      throw error;
    }
  }

  /** Runs the whole pipeline for one intent. */
  async send(intent: TokenIntent, options: SendOptions = {}): Promise<TxOutcome> {
    if (options.simulate ?? this.config.simulate) {
      const simulation = await this.simulate(intent);
      if (!simulation.ok) {
        const error: SubmissionError =
          simulation.error.type === "NetworkFailure"
            ? simulation.error
            : { type: "PredictedRevert", reason: simulation.error };
        return { status: "failed", error };
      }
    }

    const built = await this.build(intent, options);
    if (!built.ok) return { status: "failed", error: built.error };

    const signed = await this.sign(built.value);
    const pending = await this.broadcast(signed);
    if (!pending.ok) return { status: "failed", error: pending.error };

    return pending.value.wait(options);
  }

  /* -------------------------------------------------------------------------- */
  /*                                   INTENTS                                  */
  /* -------------------------------------------------------------------------- */

  transfer(to: Address, amount: Amount, options?: SendOptions): Promise<TxOutcome> {
    return this.send({ type: "transfer", to, amount }, options);
  }

  approve(spender: Address, amount: Amount, options?: SendOptions): Promise<TxOutcome> {
    return this.send({ type: "approve", spender, amount }, options);
  }

  transferFrom(from: Address, to: Address, amount: Amount, options?: SendOptions): Promise<TxOutcome> {
    return this.send({ type: "transferFrom", from, to, amount }, options);
  }

  /** Sends native currency, e.g. so that `to` can pay for its own transactions */
  fund(to: Address, value: bigint, options?: SendOptions): Promise<TxOutcome> {
    return this.send({ type: "native", to, value }, options);
  }

  /**
   * Approves the current allowance plus `delta`.
   *
   * Note: this reads then overwrites; another approval for the same spender included in between is lost.
   */
  async increaseAllowance(spender: Address, delta: Amount, options?: SendOptions): Promise<TxOutcome> {
    const current = await this.allowance(this.address, spender);
    const next = addAmounts(current, delta);
    if (next === undefined) throw new RangeError(`allowance ${current} + ${delta} overflows uint256`);
    return this.approve(spender, next, options);
  }

  /* -------------------------------------------------------------------------- */
  /*                                  INTERNALS                                 */
  /* -------------------------------------------------------------------------- */

  private async getChainId(): Promise<number> {
    this.chainId ??= await this.client.getChainId();
    return this.chainId;
  }

  private async resolveFees(overrides: BuildOverrides): Promise<FeeParams> {
    const model = overrides.feeModel ?? this.config.feeModel;
    if (model === "legacy") return { type: "legacy", gasPrice: overrides.gasPrice ?? (await this.client.getGasPrice()) };

    const maxPriorityFeePerGas = overrides.maxPriorityFeePerGas ?? (await this.client.estimateMaxPriorityFeePerGas());
    const maxFeePerGas = overrides.maxFeePerGas ?? (await this.client.getGasPrice()) * 2n + maxPriorityFeePerGas;
    return { type: "eip1559", maxFeePerGas, maxPriorityFeePerGas };
  }

  private async outcomeOf(receipt: TransactionReceipt): Promise<WaitOutcome> {
    const hash = receipt.transactionHash;
    if (receipt.status === "success")
      return { status: "confirmed", hash, receipt, events: eventsFromLogs(receipt.logs, this.token) };

    return { status: "reverted", hash, receipt, reason: await this.revertReason(receipt) };
  }

  /**
   * Receipts carry no revert data: it is read from the node's call trace, which saw the state left by the transactions
   * before it in the same block.
   *
   * Note: on a node without `debug_traceTransaction` the transaction is replayed as a call on the parent block instead;
   * if an earlier transaction in the same block changed the outcome, the reason is reported as an undecoded revert.
   */
  private async revertReason(receipt: TransactionReceipt): Promise<RevertReason> {
    const traced = await this.tracedRevert(receipt.transactionHash);
    if (traced) return traced;

    const tx = await this.client.getTransaction({ hash: receipt.transactionHash }).catch((error: unknown) => {
      logger.error(`Could not fetch reverted transaction ${receipt.transactionHash}: ${messageOf(error)}`);
      return undefined;
    });
    if (!tx?.to) return { type: "Reverted", data: "0x" };

    try {
      const parent = receipt.blockNumber - 1n;
      await this.client.call({
        account: tx.from,
        to: tx.to,
        data: tx.input,
        value: tx.value,
        // A zero block number is sent as `latest`
        ...(parent === 0n ? ({ blockTag: "earliest" } as const) : { blockNumber: parent }),
      });
      return { type: "Reverted", data: "0x", message: "reverted after an earlier transaction in the same block" };
    } catch (error) {
      return (
        revertReasonOf(error, { owner: transferFromOwner(tx.input) }) ?? {
          type: "Reverted",
          data: "0x",
          message: messageOf(error),
        }
      );
    }
  }

  private async tracedRevert(hash: Hex): Promise<RevertReason | undefined> {
    try {
      const trace = await this.client.request<{ Parameters: [Hex, { tracer: "callTracer" }]; ReturnType: unknown }>({
        method: "debug_traceTransaction",
        params: [hash, { tracer: "callTracer" }],
      });
      if (!isRevertedFrame(trace)) return undefined;
      return decodeRevert(trace.output, { owner: transferFromOwner(trace.input) });
    } catch (error) {
      logger.log(`No call trace for ${hash}: ${messageOf(error)}`);
      return undefined;
    }
  }
}

type RevertedFrame = { input: Hex; output: Hex };

const isRevertedFrame = (trace: unknown): trace is RevertedFrame =>
  typeof trace === "object" &&
  trace !== null &&
  "error" in trace &&
  typeof trace.error === "string" &&
  "input" in trace &&
  typeof trace.input === "string" &&
  isHex(trace.input) &&
  "output" in trace &&
  typeof trace.output === "string" &&
  isHex(trace.output);

/** Owner whose allowance a `transferFrom` call spends */
const transferFromOwner = (input: Hex): Address | undefined => {
  try {
    const call = decodeFunctionData({ abi: erc20Abi, data: input });
    return call.functionName === "transferFrom" ? call.args[0] : undefined;
  } catch {
    return undefined;
  }
};
