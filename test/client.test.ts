import { custom, keccak256, parseEther, parseGwei } from "viem";
import { assert, describe, expect, it } from "vitest";

import { ACCOUNTS, NATIVE_BALANCE, TOKEN } from "@test/constants.js";
import { createFlakyTransport, getNode, getTokenClient } from "@test/utils.js";
import type { TokenIntent } from "@/lib/client/types.js";
import { encodeIntent } from "@/lib/codec.js";
import { DEFAULT_CHAIN_ID, intrinsicGas } from "@/lib/node/index.js";

const { owner, recipient, spender, broke } = ACCOUNTS;

describe("TokenClient", () => {
  describe("reads", () => {
    it("should read the token metadata", async () => {
      const client = getTokenClient();

      expect(await client.metadata()).toEqual(TOKEN);
    });

    it("should read balances and allowances", async () => {
      const client = getTokenClient();

      expect(await client.balanceOf(owner.address)).toBe(TOKEN.totalSupply);
      expect(await client.balanceOf(recipient.address)).toBe(0n);
      expect(await client.allowance(owner.address, spender.address)).toBe(0n);
      expect(await client.nativeBalance()).toBe(NATIVE_BALANCE);
    });
  });

  describe("build", () => {
    it("should bind the intent to the next nonce, the chain id and the node's gas price", async () => {
      const client = getTokenClient();
      const intent = { type: "transfer", to: recipient.address, amount: 1n } as const;

      const built = await client.build(intent);

      expect(built).toEqual({
        ok: true,
        value: {
          stage: "built",
          from: owner.address,
          nonce: 0,
          chainId: DEFAULT_CHAIN_ID,
          intent,
          call: encodeIntent(getNode().tokenAddress, intent),
          gas: 300_000n,
          fees: { type: "legacy", gasPrice: parseGwei("1") },
        },
      });
    });

    it("should never give the same nonce to concurrent builds", async () => {
      const client = getTokenClient();

      const built = await Promise.all(
        Array.from({ length: 5 }, (_, i) => client.build({ type: "transfer", to: recipient.address, amount: BigInt(i) })),
      );

      expect(built.map((result) => (result.ok ? result.value.nonce : -1))).toEqual([0, 1, 2, 3, 4]);
    });

    it("should compute eip1559 fees from the node", async () => {
      const client = getTokenClient(owner, { config: { feeModel: "eip1559" } });

      const built = await client.build({ type: "transfer", to: recipient.address, amount: 1n });
      assert(built.ok);

      // Twice the base fee plus a zero tip
      expect(built.value.fees).toEqual({ type: "eip1559", maxFeePerGas: parseGwei("2"), maxPriorityFeePerGas: 0n });
    });

    it("should fail without taking a nonce when the node cannot be reached", async () => {
      const client = getTokenClient(owner, { transport: createFlakyTransport(getNode(), ["eth_gasPrice"]) });

      const built = await client.build({ type: "transfer", to: recipient.address, amount: 1n });

      expect(built).toMatchObject({ ok: false, error: { type: "NetworkFailure" } });
      expect(client.nonces.peek(owner.address)).toBeUndefined();
    });
  });

  describe("send", () => {
    it("should confirm a transfer with its events", async () => {
      const client = getTokenClient();

      const outcome = await client.transfer(recipient.address, 100n);
      assert(outcome.status === "confirmed");

      expect(outcome.events).toEqual([
        { eventName: "Transfer", args: { from: owner.address, to: recipient.address, value: 100n } },
      ]);
      expect(outcome.receipt.blockNumber).toBe(1n);
      expect(await client.balanceOf(recipient.address)).toBe(100n);
    });

    it("should run concurrent sends from one account to completion", async () => {
      const client = getTokenClient();

      const outcomes = await Promise.all([1n, 2n, 3n, 4n].map((amount) => client.transfer(recipient.address, amount)));

      expect(outcomes.map((outcome) => outcome.status)).toEqual(["confirmed", "confirmed", "confirmed", "confirmed"]);
      expect(await client.balanceOf(recipient.address)).toBe(10n);
      expect(getNode().nonceOf(owner.address)).toBe(4);
    });

    it("should report a reverted transfer with the decoded reason and consume the nonce", async () => {
      const client = getTokenClient(recipient);

      const outcome = await client.transfer(owner.address, 1n);
      assert(outcome.status === "reverted");

      expect(outcome.reason).toEqual({ type: "InsufficientBalance", account: recipient.address, balance: 0n, needed: 1n });
      expect(getNode().nonceOf(recipient.address)).toBe(1);

      // The next transaction uses the following nonce
      const next = await client.build({ type: "approve", spender: spender.address, amount: 1n });
      assert(next.ok);
      expect(next.value.nonce).toBe(1);
    });

    it("should fail fast on a predicted revert without taking a nonce", async () => {
      const client = getTokenClient(recipient, { config: { simulate: true } });

      const outcome = await client.transfer(owner.address, 1n);

      expect(outcome).toEqual({
        status: "failed",
        error: {
          type: "PredictedRevert",
          reason: { type: "InsufficientBalance", account: recipient.address, balance: 0n, needed: 1n },
        },
      });
      expect(client.nonces.peek(recipient.address)).toBeUndefined();
      expect(getNode().nonceOf(recipient.address)).toBe(0);
    });

    it("should report a submission from an account without gas money as rejected", async () => {
      const client = getTokenClient(broke);

      const outcome = await client.transfer(owner.address, 0n);

      expect(outcome).toEqual({
        status: "failed",
        error: {
          type: "Rejected",
          message: `insufficient funds for gas * price + value: balance 0, tx cost ${300_000n * parseGwei("1")}`,
        },
      });
      // The refused nonce is handed out again
      expect(client.nonces.peek(broke.address)).toBeUndefined();
    });

    it("should report a transaction signed for another chain as rejected", async () => {
      const client = getTokenClient(owner, { chainId: 1 });

      const outcome = await client.transfer(recipient.address, 1n);

      expect(outcome).toEqual({
        status: "failed",
        error: { type: "Rejected", message: `invalid chain id: expected ${DEFAULT_CHAIN_ID}, got 1` },
      });
    });

    it("should fund an account with native currency", async () => {
      const client = getTokenClient();

      const outcome = await client.fund(broke.address, parseEther("1"));

      expect(outcome).toMatchObject({ status: "confirmed", events: [] });
      expect(await client.nativeBalance(broke.address)).toBe(parseEther("1"));
      expect(await client.nativeBalance()).toBe(NATIVE_BALANCE - parseEther("1") - intrinsicGas("0x") * parseGwei("1"));
    });

    it("should send eip1559 transactions", async () => {
      const client = getTokenClient(owner, { config: { feeModel: "eip1559" } });

      const outcome = await client.transfer(recipient.address, 5n);

      expect(outcome.status).toBe("confirmed");
      expect(await client.balanceOf(recipient.address)).toBe(5n);
    });
  });

  describe("broadcast", () => {
    it("should free the nonce after a network failure", async () => {
      const client = getTokenClient(owner, {
        transport: createFlakyTransport(getNode(), ["eth_sendRawTransaction"]),
      });

      const built = await client.build({ type: "transfer", to: recipient.address, amount: 1n });
      assert(built.ok);
      const broadcast = await client.broadcast(await client.sign(built.value));

      expect(broadcast).toMatchObject({ ok: false, error: { type: "NetworkFailure" } });
      expect(client.nonces.peek(owner.address)).toBeUndefined();

      const retry = await client.build({ type: "transfer", to: recipient.address, amount: 1n });
      assert(retry.ok);
      expect(retry.value.nonce).toBe(0);
    });

    it("should not hand a nonce held by an unbroadcast build to another build", async () => {
      const client = getTokenClient(owner, {
        transport: createFlakyTransport(getNode(), ["eth_sendRawTransaction"], 1),
      });
      const intent: TokenIntent = { type: "transfer", to: recipient.address, amount: 1n };

      const first = await client.build(intent);
      const second = await client.build(intent);
      assert(first.ok && second.ok);
      expect([first.value.nonce, second.value.nonce]).toEqual([0, 1]);

      const failed = await client.broadcast(await client.sign(first.value));
      expect(failed).toMatchObject({ ok: false, error: { type: "NetworkFailure" } });

      // The freed nonce is filled first
      const third = await client.build(intent);
      assert(third.ok);
      expect(third.value.nonce).toBe(0);
      expect((await client.broadcast(await client.sign(third.value))).ok).toBe(true);

      // Nonce 1 still belongs to the second build
      const fourth = await client.build(intent);
      assert(fourth.ok);
      expect(fourth.value.nonce).toBe(2);

      const late = await client.broadcast(await client.sign(second.value));
      assert(late.ok);
      expect(await late.value.wait()).toMatchObject({ status: "confirmed" });
      expect(getNode().nonceOf(owner.address)).toBe(2);
    });

    it("should track the transaction under the hash the node returns", async () => {
      const node = getNode();
      const nodeHash = keccak256("0x01");
      const transport = custom(
        {
          request: async ({ method, params }: { method: string; params?: unknown }) => {
            const result = await node.request({ method, params });
            return method === "eth_sendRawTransaction" ? nodeHash : result;
          },
        },
        { retryCount: 0 },
      );
      const client = getTokenClient(owner, { transport });

      const built = await client.build({ type: "transfer", to: recipient.address, amount: 1n });
      assert(built.ok);
      const signed = await client.sign(built.value);
      const broadcast = await client.broadcast(signed);

      assert(broadcast.ok);
      expect(broadcast.value.hash).toBe(nodeHash);
      expect(broadcast.value.transaction).toBe(signed);
      expect(client.pendingTransactions().map((pending) => pending.hash)).toEqual([nodeHash]);
    });

    it("should report a duplicate submission as an invalid nonce", async () => {
      const client = getTokenClient();
      const built = await client.build({ type: "transfer", to: recipient.address, amount: 1n });
      assert(built.ok);
      const signed = await client.sign(built.value);

      const first = await client.broadcast(signed);
      const second = await client.broadcast(signed);

      expect(first.ok).toBe(true);
      expect(second).toEqual({ ok: false, error: { type: "InvalidNonce", nonce: 0, message: "already known" } });
    });

    it("should report a stale nonce as an invalid nonce", async () => {
      const client = getTokenClient();
      await client.transfer(recipient.address, 1n);

      const built = await client.build({ type: "transfer", to: recipient.address, amount: 2n });
      assert(built.ok);
      const stale = await client.sign({ ...built.value, nonce: 0 });

      expect(await client.broadcast(stale)).toEqual({
        ok: false,
        error: { type: "InvalidNonce", nonce: 0, message: "nonce too low: next nonce 1, tx nonce 0" },
      });
    });
  });

  describe("auditSupply", () => {
    it("should find the balances adding up to the supply", async () => {
      const client = getTokenClient();
      await client.transfer(recipient.address, 100n);
      await client.transfer(spender.address, 50n);

      expect(await client.auditSupply([owner.address, recipient.address, spender.address, recipient.address])).toEqual({
        totalSupply: TOKEN.totalSupply,
        balances: {
          [owner.address]: TOKEN.totalSupply - 150n,
          [recipient.address]: 100n,
          [spender.address]: 50n,
        },
        sum: TOKEN.totalSupply,
        consistent: true,
      });
    });

    it("should flag holders that do not cover the supply", async () => {
      const client = getTokenClient();
      await client.transfer(recipient.address, 100n);

      expect(await client.auditSupply([owner.address])).toMatchObject({
        sum: TOKEN.totalSupply - 100n,
        consistent: false,
      });
    });
  });
});
