import {
  custom,
  decodeFunctionData,
  encodeAbiParameters,
  encodeEventTopics,
  encodeFunctionResult,
  erc20Abi,
  getAddress,
  hexToBigInt,
  keccak256,
  numberToHex,
  parseGwei,
  parseTransaction,
  recoverAddress,
  serializeTransaction,
  zeroAddress,
  zeroHash,
  type Address,
  type CustomTransport,
  type CustomTransportConfig,
  type Hex,
} from "viem";

import type { FeeParams } from "@/lib/client/types.js";
import { encodeRevert } from "@/lib/codec.js";
import { TokenLedger } from "@/lib/ledger/index.js";
import { AddressMap } from "@/lib/ledger/address-map.js";
import type { LedgerEvent } from "@/lib/ledger/types.js";
import { NodeRpcError, RPC_ERROR, rejected, reverted } from "@/lib/node/errors.js";
import {
  assertCallTracer,
  paramsArray,
  readAddress,
  readBlockTag,
  readCallRequest,
  readHex,
  readQuantity,
  type BlockTag,
} from "@/lib/node/params.js";
import type {
  BlockRecord,
  CallRequest,
  CallTraceJson,
  LedgerNodeOptions,
  RpcLogJson,
  RpcReceiptJson,
  StoredTransaction,
} from "@/lib/node/types.js";
import { err, ok, type Result } from "@/lib/result.js";
import { logger } from "@/logger.js";

/** Address of the first contract deployed by the default dev account on a fresh devnet */
export const DEFAULT_TOKEN_ADDRESS: Address = "0x5FbDB2315678afecb367f032d93F642f64180aa3";
export const DEFAULT_CHAIN_ID = 31337;

const TX_GAS = 21_000n;
const TX_DATA_ZERO_GAS = 4n;
const TX_DATA_NON_ZERO_GAS = 16n;
const EMPTY_BLOOM: Hex = `0x${"00".repeat(256)}`;

/** Gas charged for a transaction: the base cost plus its calldata. */
export const intrinsicGas = (data: Hex): bigint => {
  let gas = TX_GAS;
  for (let i = 2; i < data.length; i += 2) gas += data.slice(i, i + 2) === "00" ? TX_DATA_ZERO_GAS : TX_DATA_NON_ZERO_GAS;
  return gas;
};

type CallResult = Result<{ returnData: Hex; events: Array<LedgerEvent> }, Hex>;

/**
 * An in-process JSON-RPC node hosting a single token ledger on a minimal devnet.
 *
 * It keeps per-account nonces and native balances, queues transactions with a future nonce until their predecessor is
 * mined, charges gas, reverts failing ledger transitions (the nonce still advances) and keeps the token state of every
 * block for calls at a past block.
 *
 * Use {@link createNodeTransport} to reach it through a viem client.
 */
export class LedgerNode {
  readonly chainId: number;
  readonly tokenAddress: Address;
  readonly baseFeePerGas: bigint;
  readonly blockGasLimit: bigint;

  private mining: "auto" | "manual";
  private readonly ledger: TokenLedger;
  private readonly nativeBalances = new AddressMap<bigint>();
  private readonly nonces = new AddressMap<number>();
  private readonly blocks: Array<BlockRecord> = [];
  private readonly pool = new Map<Hex, StoredTransaction>();
  private readonly transactions = new Map<Hex, StoredTransaction>();
  private readonly receipts = new Map<Hex, RpcReceiptJson>();
  private seq = 0;

  constructor(options: LedgerNodeOptions) {
    const { address = DEFAULT_TOKEN_ADDRESS, ...genesis } = options.token;
    this.chainId = options.chainId ?? DEFAULT_CHAIN_ID;
    this.tokenAddress = getAddress(address);
    this.baseFeePerGas = options.baseFeePerGas ?? parseGwei("1");
    this.blockGasLimit = options.blockGasLimit ?? 30_000_000n;
    this.mining = options.mining?.type ?? "auto";

    this.ledger = TokenLedger.genesis(genesis).ledger;
    for (const [account, balance] of Object.entries(options.accounts ?? {}))
      this.nativeBalances.set(readAddress(account, "account"), balance);

    this.blocks.push({
      number: 0n,
      hash: blockHash(0n, zeroHash),
      parentHash: zeroHash,
      timestamp: BigInt(Math.floor(Date.now() / 1000)),
      gasUsed: 0n,
      transactions: [],
      ledger: this.ledger.clone(),
    });
  }

  /* ------------------------------ INSPECTION ------------------------------ */
  get blockNumber(): bigint {
    return this.latest().number;
  }

  /** Current token state; mutate it only through transactions */
  get token(): TokenLedger {
    return this.ledger;
  }

  /** Hashes of the transactions waiting in the pool, in arrival order */
  get pendingTransactions(): Array<Hex> {
    return [...this.pool.values()].sort((a, b) => a.seq - b.seq).map((tx) => tx.hash);
  }

  nonceOf(account: Address): number {
    return this.nonces.get(account) ?? 0;
  }

  nativeBalanceOf(account: Address): bigint {
    return this.nativeBalances.get(account) ?? 0n;
  }

  setNativeBalance(account: Address, balance: bigint): void {
    this.nativeBalances.set(account, balance);
  }

  setMining(type: "auto" | "manual"): void {
    this.mining = type;
    if (type === "auto") this.mineExecutable();
  }

  /** Removes a pending transaction from the pool; it will never be mined. */
  dropTransaction(hash: Hex): boolean {
    const dropped = this.pool.delete(hash);
    if (dropped) {
      this.transactions.delete(hash);
      logger.node(`Dropped ${hash}`);
    }
    return dropped;
  }

  /**
   * Mines a block with every executable transaction, in arrival order.
   *
   * A transaction is executable when its nonce is the sender's next one; a sender's following nonces become executable
   * within the same block.
   *
   * @returns The hashes of the transactions included in the block
   */
  mine(): Array<Hex> {
    return this.mineBlock(Infinity).transactions;
  }

  /* --------------------------------- RPC ---------------------------------- */
  async request({ method, params }: { method: string; params?: unknown }): Promise<unknown> {
    const args = paramsArray(params);

    switch (method) {
      case "eth_chainId":
        return numberToHex(this.chainId);
      case "net_version":
        return String(this.chainId);
      case "eth_blockNumber":
        return numberToHex(this.blockNumber);
      case "eth_gasPrice":
        return numberToHex(this.baseFeePerGas);
      case "eth_maxPriorityFeePerGas":
        return numberToHex(0n);
      case "eth_getBalance":
        return numberToHex(this.nativeBalanceOf(readAddress(args[0], "address")));
      case "eth_getTransactionCount": {
        const address = readAddress(args[0], "address");
        return numberToHex(args[1] === "pending" ? this.pendingNonceOf(address) : this.nonceOf(address));
      }
      case "eth_call": {
        const result = this.call(readCallRequest(args[0]), readBlockTag(args[1]));
        if (!result.ok) throw reverted(result.error);
        return result.value.returnData;
      }
      case "eth_estimateGas": {
        const request = readCallRequest(args[0]);
        const result = this.call(request, "latest");
        if (!result.ok) throw reverted(result.error);
        return numberToHex(intrinsicGas(request.data));
      }
      case "eth_sendRawTransaction":
        return this.submit(readHex(args[0], "transaction"));
      case "eth_getTransactionByHash":
        return this.transactionJson(readHex(args[0], "hash"));
      case "eth_getTransactionReceipt":
        return this.receipts.get(readHex(args[0], "hash")) ?? null;
      case "eth_getBlockByNumber":
        return this.blockJson(readBlockTag(args[0]), args[1] === true);
      case "evm_mine":
        this.mine();
        return "0x0";
      case "anvil_dropTransaction":
        this.dropTransaction(readHex(args[0], "hash"));
        return null;
      case "debug_traceTransaction":
        assertCallTracer(args[1]);
        return this.callTrace(readHex(args[0], "hash"));
      case "anvil_setBalance":
        this.setNativeBalance(readAddress(args[0], "address"), readQuantity(args[1], "balance"));
        return null;
      default:
        throw new NodeRpcError(RPC_ERROR.METHOD_NOT_FOUND, `Method ${method} not found`);
    }
  }

  /* ------------------------------ SUBMISSION ------------------------------ */
  private async submit(raw: Hex): Promise<Hex> {
    const tx = await this.decodeRawTransaction(raw);

    if (this.transactions.has(tx.hash)) throw rejected("already known");
    const next = this.nonceOf(tx.from);
    if (tx.nonce < next) throw rejected(`nonce too low: next nonce ${next}, tx nonce ${tx.nonce}`);
    for (const pending of this.pool.values()) {
      if (pending.from === tx.from && pending.nonce === tx.nonce) throw rejected("replacement transaction underpriced");
    }

    const minimumGas = intrinsicGas(tx.data);
    if (tx.gas < minimumGas) throw rejected(`intrinsic gas too low: have ${tx.gas}, want ${minimumGas}`);
    if (tx.gas > this.blockGasLimit) throw rejected("exceeds block gas limit");

    const priceCap = tx.fees.type === "legacy" ? tx.fees.gasPrice : tx.fees.maxFeePerGas;
    if (tx.fees.type === "eip1559" && tx.fees.maxPriorityFeePerGas > tx.fees.maxFeePerGas)
      throw rejected("max priority fee per gas higher than max fee per gas");
    if (priceCap < this.baseFeePerGas)
      throw rejected(`transaction underpriced: fee cap ${priceCap} below base fee ${this.baseFeePerGas}`);

    const cost = tx.gas * priceCap + tx.value;
    const balance = this.nativeBalanceOf(tx.from);
    if (balance < cost) throw rejected(`insufficient funds for gas * price + value: balance ${balance}, tx cost ${cost}`);

    this.pool.set(tx.hash, tx);
    this.transactions.set(tx.hash, tx);
    logger.node(`Accepted ${tx.hash} from ${tx.from} with nonce ${tx.nonce}`);

    if (this.mining === "auto") this.mineExecutable();
    return tx.hash;
  }

  /** Parses a signed raw transaction and recovers its sender from the signature over the chain-bound payload. */
  private async decodeRawTransaction(raw: Hex): Promise<StoredTransaction> {
    const parsed = (() => {
      try {
        return parseTransaction(raw);
      } catch (error) {
        throw rejected(`invalid transaction: ${error instanceof Error ? error.message : String(error)}`);
      }
    })();

    if (parsed.type !== "legacy" && parsed.type !== "eip1559") throw rejected(`transaction type not supported`);
    if (parsed.chainId === undefined)
      throw rejected("only replay-protected (EIP-155) transactions allowed over RPC");
    if (parsed.chainId !== this.chainId)
      throw rejected(`invalid chain id: expected ${this.chainId}, got ${parsed.chainId}`);
    if (!parsed.to) throw rejected("contract creation is not supported");

    const { r, s } = parsed;
    if (!r || !s) throw rejected("transaction is not signed");

    const nonce = parsed.nonce ?? 0;
    const gas = parsed.gas ?? 0n;
    const value = parsed.value ?? 0n;
    const data = parsed.data ?? "0x";
    const to = parsed.to;

    let fees: FeeParams;
    let unsigned: Hex;
    let yParity: number;
    let v: bigint;
    if (parsed.type === "legacy") {
      fees = { type: "legacy", gasPrice: parsed.gasPrice ?? 0n };
      unsigned = serializeTransaction({
        type: "legacy",
        chainId: parsed.chainId,
        nonce,
        gas,
        gasPrice: fees.gasPrice,
        to,
        value,
        data,
      });
      v = parsed.v ?? 0n;
      // EIP-155: v = chainId * 2 + 35 + yParity
      yParity = v >= 35n ? Number((v - 35n) % 2n) : Number(v - 27n);
    } else {
      fees = {
        type: "eip1559",
        maxFeePerGas: parsed.maxFeePerGas ?? 0n,
        maxPriorityFeePerGas: parsed.maxPriorityFeePerGas ?? 0n,
      };
      unsigned = serializeTransaction({
        type: "eip1559",
        chainId: parsed.chainId,
        nonce,
        gas,
        maxFeePerGas: fees.maxFeePerGas,
        maxPriorityFeePerGas: fees.maxPriorityFeePerGas,
        to,
        value,
        data,
        accessList: parsed.accessList ?? [],
      });
      yParity = parsed.yParity ?? 0;
      v = BigInt(yParity);
    }

    let from: Address;
    try {
      from = getAddress(await recoverAddress({ hash: keccak256(unsigned), signature: { r, s, yParity } }));
    } catch (error) {
      throw rejected(`invalid sender: ${error instanceof Error ? error.message : String(error)}`);
    }

    return {
      hash: keccak256(raw),
      from,
      to: getAddress(to),
      nonce,
      gas,
      value,
      data,
      fees,
      chainId: parsed.chainId,
      signature: { r, s, v, yParity },
      seq: this.seq++,
    };
  }

  private pendingNonceOf(account: Address): number {
    let nonce = this.nonceOf(account);
    const queued = new Set(
      [...this.pool.values()].filter((tx) => tx.from === getAddress(account)).map((tx) => tx.nonce),
    );
    while (queued.has(nonce)) nonce++;
    return nonce;
  }

  /* -------------------------------- MINING -------------------------------- */
  private mineExecutable(): void {
    while (this.nextExecutable()) this.mineBlock(1);
  }

  private nextExecutable(): StoredTransaction | undefined {
    let next: StoredTransaction | undefined;
    for (const tx of this.pool.values()) {
      if (tx.nonce !== this.nonceOf(tx.from)) continue;
      if (!next || tx.seq < next.seq) next = tx;
    }
    return next;
  }

  private mineBlock(limit: number): BlockRecord {
    const parent = this.latest();
    const number = parent.number + 1n;
    const hash = blockHash(number, parent.hash);
    const now = BigInt(Math.floor(Date.now() / 1000));
    const block: BlockRecord = {
      number,
      hash,
      parentHash: parent.hash,
      timestamp: now > parent.timestamp ? now : parent.timestamp + 1n,
      gasUsed: 0n,
      transactions: [],
      ledger: this.ledger,
    };

    let tx = this.nextExecutable();
    while (tx && block.transactions.length < limit) {
      this.pool.delete(tx.hash);
      const receipt = this.execute(tx, block);
      if (receipt) {
        block.transactions.push(tx.hash);
        block.gasUsed = hexToBigInt(receipt.cumulativeGasUsed);
        this.receipts.set(tx.hash, receipt);
      } else {
        this.transactions.delete(tx.hash);
        logger.node(`Dropped ${tx.hash}: sender can no longer pay for it`);
      }
      tx = this.nextExecutable();
    }

    block.ledger = this.ledger.clone();
    this.blocks.push(block);
    logger.node(`Mined block ${number} with ${block.transactions.length} transaction(s)`);
    return block;
  }

  /** Applies a transaction to the current state; `undefined` if the sender cannot pay for it. */
  private execute(tx: StoredTransaction, block: BlockRecord): RpcReceiptJson | undefined {
    const gasUsed = intrinsicGas(tx.data);
    const effectiveGasPrice =
      tx.fees.type === "legacy"
        ? tx.fees.gasPrice
        : min(tx.fees.maxFeePerGas, this.baseFeePerGas + tx.fees.maxPriorityFeePerGas);
    const fee = gasUsed * effectiveGasPrice;

    const balance = this.nativeBalanceOf(tx.from);
    if (balance < fee + tx.value) return undefined;

    this.nativeBalances.set(tx.from, balance - fee);
    this.nonces.set(tx.from, tx.nonce + 1);

    let status: "0x1" | "0x0" = "0x1";
    let events: Array<LedgerEvent> = [];
    let output: Hex = "0x";
    if (tx.to === this.tokenAddress) {
      const result = tx.value > 0n ? err<Hex>("0x") : applyTokenCall(this.ledger, tx.from, tx.data);
      if (result.ok) {
        events = result.value.events;
        output = result.value.returnData;
      } else {
        status = "0x0";
        output = result.error;
      }
    } else {
      this.nativeBalances.set(tx.from, balance - fee - tx.value);
      this.nativeBalances.set(tx.to, this.nativeBalanceOf(tx.to) + tx.value);
    }

    const index = block.transactions.length;
    tx.block = {
      number: block.number,
      hash: block.hash,
      index,
      effectiveGasPrice,
      gasUsed,
      output,
      reverted: status === "0x0",
    };

    return {
      transactionHash: tx.hash,
      transactionIndex: numberToHex(index),
      blockHash: block.hash,
      blockNumber: numberToHex(block.number),
      from: tx.from,
      to: tx.to,
      cumulativeGasUsed: numberToHex(block.gasUsed + gasUsed),
      gasUsed: numberToHex(gasUsed),
      effectiveGasPrice: numberToHex(effectiveGasPrice),
      contractAddress: null,
      logs: events.map((event, logIndex) => this.logJson(event, tx, block, index, logIndex)),
      logsBloom: EMPTY_BLOOM,
      status,
      type: tx.fees.type === "legacy" ? "0x0" : "0x2",
    };
  }

  /* --------------------------------- CALLS -------------------------------- */
  /** Executes a call on a copy of the state at the given block. */
  private call(request: CallRequest, blockTag: BlockTag): CallResult {
    const ledger = this.stateAt(blockTag).clone();
    if (!request.to || getAddress(request.to) !== this.tokenAddress) return ok({ returnData: "0x", events: [] });
    if (request.value > 0n) return err("0x");

    return applyTokenCall(ledger, request.from ?? zeroAddress, request.data);
  }

  private stateAt(blockTag: BlockTag): TokenLedger {
    if (blockTag === "latest") return this.ledger;
    const block = this.blocks[Number(blockTag)];
    if (!block) throw rejected(`header not found: block ${blockTag}`);
    return block.ledger;
  }

  private latest(): BlockRecord {
    const block = this.blocks[this.blocks.length - 1];
    if (!block) throw new Error("Node has no genesis block");
    return block;
  }

  /* ------------------------------ JSON SHAPES ----------------------------- */
  private logJson(
    event: LedgerEvent,
    tx: StoredTransaction,
    block: BlockRecord,
    transactionIndex: number,
    logIndex: number,
  ): RpcLogJson {
    const topics =
      event.eventName === "Transfer"
        ? encodeEventTopics({ abi: erc20Abi, eventName: "Transfer", args: { from: event.args.from, to: event.args.to } })
        : encodeEventTopics({
            abi: erc20Abi,
            eventName: "Approval",
            args: { owner: event.args.owner, spender: event.args.spender },
          });

    return {
      address: this.tokenAddress,
      topics: topics.filter((topic): topic is Hex => typeof topic === "string"),
      data: encodeAbiParameters([{ type: "uint256" }], [event.args.value]),
      blockNumber: numberToHex(block.number),
      blockHash: block.hash,
      transactionHash: tx.hash,
      transactionIndex: numberToHex(transactionIndex),
      logIndex: numberToHex(logIndex),
      removed: false,
    };
  }

  /** Top-level frame of a mined transaction, as the `callTracer` reports it */
  private callTrace(hash: Hex): CallTraceJson {
    const tx = this.transactions.get(hash);
    if (!tx?.block) throw rejected(`transaction ${hash} not found`);
    const { gasUsed, output, reverted } = tx.block;

    return {
      type: "CALL",
      from: tx.from,
      to: tx.to,
      value: numberToHex(tx.value),
      gas: numberToHex(tx.gas),
      gasUsed: numberToHex(gasUsed),
      input: tx.data,
      output,
      ...(reverted ? { error: "execution reverted" } : {}),
    };
  }

  private transactionJson(hash: Hex): Record<string, unknown> | null {
    const tx = this.transactions.get(hash);
    if (!tx) return null;

    const fees =
      tx.fees.type === "legacy"
        ? { type: "0x0", gasPrice: numberToHex(tx.fees.gasPrice) }
        : {
            type: "0x2",
            maxFeePerGas: numberToHex(tx.fees.maxFeePerGas),
            maxPriorityFeePerGas: numberToHex(tx.fees.maxPriorityFeePerGas),
            gasPrice: numberToHex(tx.block?.effectiveGasPrice ?? tx.fees.maxFeePerGas),
            accessList: [],
            yParity: numberToHex(tx.signature.yParity),
          };

    return {
      hash: tx.hash,
      nonce: numberToHex(tx.nonce),
      blockHash: tx.block?.hash ?? null,
      blockNumber: tx.block ? numberToHex(tx.block.number) : null,
      transactionIndex: tx.block ? numberToHex(tx.block.index) : null,
      from: tx.from,
      to: tx.to,
      value: numberToHex(tx.value),
      gas: numberToHex(tx.gas),
      input: tx.data,
      chainId: numberToHex(tx.chainId),
      v: numberToHex(tx.signature.v),
      r: tx.signature.r,
      s: tx.signature.s,
      ...fees,
    };
  }

  private blockJson(blockTag: BlockTag, includeTransactions: boolean): Record<string, unknown> | null {
    const block = blockTag === "latest" ? this.latest() : this.blocks[Number(blockTag)];
    if (!block) return null;

    return {
      number: numberToHex(block.number),
      hash: block.hash,
      parentHash: block.parentHash,
      timestamp: numberToHex(block.timestamp),
      gasLimit: numberToHex(this.blockGasLimit),
      gasUsed: numberToHex(block.gasUsed),
      baseFeePerGas: numberToHex(this.baseFeePerGas),
      miner: zeroAddress,
      difficulty: "0x0",
      totalDifficulty: "0x0",
      extraData: "0x",
      nonce: "0x0000000000000000",
      mixHash: zeroHash,
      sha3Uncles: zeroHash,
      stateRoot: zeroHash,
      receiptsRoot: zeroHash,
      transactionsRoot: zeroHash,
      logsBloom: EMPTY_BLOOM,
      size: "0x0",
      uncles: [],
      transactions: includeTransactions ? block.transactions.map((hash) => this.transactionJson(hash)) : block.transactions,
    };
  }
}

/**
 * Creates a viem transport answered by an in-process node.
 *
 * Requests are not retried by default: a failed submission surfaces to the caller instead of being sent again.
 */
export const createNodeTransport = (
  node: LedgerNode,
  config?: CustomTransportConfig,
): CustomTransport =>
  custom(
    { request: ({ method, params }: { method: string; params?: unknown }) => node.request({ method, params }) },
    { name: "Ledger Node", retryCount: 0, ...config },
  );

/** Runs a token call against a ledger on behalf of `sender`; the error is the revert data. */
export const applyTokenCall = (ledger: TokenLedger, sender: Address, data: Hex): CallResult => {
  const call = decodeTokenCall(data);
  // Unknown selector: the token has no fallback function
  if (!call) return err("0x");

  const success = (events: Array<LedgerEvent>) => ({ returnData: TRUE_RESULT, events });

  switch (call.functionName) {
    case "transfer": {
      const [to, amount] = call.args;
      const result = ledger.transfer(sender, to, amount);
      return result.ok ? ok(success(result.value)) : err(encodeRevert(result.error));
    }
    case "approve": {
      const [spender, amount] = call.args;
      return ok(success(ledger.approve(sender, spender, amount)));
    }
    case "transferFrom": {
      const [from, to, amount] = call.args;
      const result = ledger.transferFrom(sender, from, to, amount);
      return result.ok ? ok(success(result.value)) : err(encodeRevert(result.error));
    }
    case "balanceOf": {
      const [account] = call.args;
      const balance = ledger.balanceOf(account);
      return view(encodeFunctionResult({ abi: erc20Abi, functionName: "balanceOf", result: balance }));
    }
    case "allowance": {
      const [owner, spender] = call.args;
      const allowance = ledger.allowance(owner, spender);
      return view(encodeFunctionResult({ abi: erc20Abi, functionName: "allowance", result: allowance }));
    }
    case "totalSupply":
      return view(encodeFunctionResult({ abi: erc20Abi, functionName: "totalSupply", result: ledger.totalSupply() }));
    case "name":
      return view(encodeFunctionResult({ abi: erc20Abi, functionName: "name", result: ledger.metadata().name }));
    case "symbol":
      return view(encodeFunctionResult({ abi: erc20Abi, functionName: "symbol", result: ledger.metadata().symbol }));
    case "decimals":
      return view(encodeFunctionResult({ abi: erc20Abi, functionName: "decimals", result: ledger.metadata().decimals }));
  }
};

const TRUE_RESULT: Hex = encodeAbiParameters([{ type: "bool" }], [true]);

const decodeTokenCall = (data: Hex) => {
  try {
    return decodeFunctionData({ abi: erc20Abi, data });
  } catch {
    return undefined;
  }
};

const view = (returnData: Hex): CallResult => ok({ returnData, events: [] });

const blockHash = (number: bigint, parentHash: Hex): Hex =>
  keccak256(encodeAbiParameters([{ type: "uint256" }, { type: "bytes32" }], [number, parentHash]));

const min = (a: bigint, b: bigint): bigint => (a < b ? a : b);

