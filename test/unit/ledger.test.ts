import { zeroAddress } from "viem";
import { assert, describe, expect, it } from "vitest";

import { ACCOUNTS, TOKEN } from "@test/constants.js";
import { assertAmount, MAX_AMOUNT } from "@/lib/amount.js";
import { TokenLedger } from "@/lib/ledger/index.js";

const { owner, recipient, spender } = ACCOUNTS;

const genesis = () => TokenLedger.genesis({ ...TOKEN, holder: owner.address });

describe("TokenLedger", () => {
  describe("genesis", () => {
    it("should mint the whole supply to the holder", () => {
      const { ledger, events } = genesis();

      expect(ledger.metadata()).toEqual(TOKEN);
      expect(ledger.balanceOf(owner.address)).toBe(TOKEN.totalSupply);
      expect(ledger.balanceOf(recipient.address)).toBe(0n);
      expect(events).toEqual([
        { eventName: "Transfer", args: { from: zeroAddress, to: owner.address, value: TOKEN.totalSupply } },
      ]);
      expect(ledger.checkSupply()).toBe(true);
    });

    it("should reject decimals that are not a uint8", () => {
      expect(() => TokenLedger.genesis({ ...TOKEN, decimals: 256, holder: owner.address })).toThrow(
        "decimals 256 is not a uint8",
      );
    });

    it("should reject a supply outside of the uint256 range", () => {
      expect(() => TokenLedger.genesis({ ...TOKEN, totalSupply: MAX_AMOUNT + 1n, holder: owner.address })).toThrow(
        RangeError,
      );
    });
  });

  describe("transfer", () => {
    it("should move the amount and emit a Transfer event", () => {
      const { ledger } = genesis();

      const result = ledger.transfer(owner.address, recipient.address, 100n);
      assert(result.ok);

      expect(result.value).toEqual([
        { eventName: "Transfer", args: { from: owner.address, to: recipient.address, value: 100n } },
      ]);
      expect(ledger.balanceOf(owner.address)).toBe(TOKEN.totalSupply - 100n);
      expect(ledger.balanceOf(recipient.address)).toBe(100n);
      expect(ledger.checkSupply()).toBe(true);
    });

    it("should look up balances regardless of address casing", () => {
      const { ledger } = genesis();
      ledger.transfer(owner.address, recipient.address, 7n);

      expect(ledger.balanceOf(`0x${recipient.address.slice(2).toLowerCase()}`)).toBe(7n);
    });

    it("should fail without changes on insufficient balance", () => {
      const { ledger } = genesis();

      expect(ledger.transfer(recipient.address, owner.address, 1n)).toEqual({
        ok: false,
        error: { type: "InsufficientBalance", account: recipient.address, balance: 0n, needed: 1n },
      });
      expect(ledger.balanceOf(owner.address)).toBe(TOKEN.totalSupply);
      expect(ledger.holders()).toEqual([owner.address]);
    });

    it("should accept a transfer to self without changing the balance", () => {
      const { ledger } = genesis();

      const result = ledger.transfer(owner.address, owner.address, 5n);
      assert(result.ok);

      expect(result.value).toEqual([
        { eventName: "Transfer", args: { from: owner.address, to: owner.address, value: 5n } },
      ]);
      expect(ledger.balanceOf(owner.address)).toBe(TOKEN.totalSupply);
    });

    it("should still check the balance on a transfer to self", () => {
      const { ledger } = genesis();

      const result = ledger.transfer(recipient.address, recipient.address, 1n);
      assert(!result.ok);
      expect(result.error.type).toBe("InsufficientBalance");
    });

    it("should accept a zero amount", () => {
      const { ledger } = genesis();

      expect(ledger.transfer(recipient.address, owner.address, 0n).ok).toBe(true);
    });

    it("should throw on an amount outside of the uint256 range", () => {
      const { ledger } = genesis();

      expect(() => ledger.transfer(owner.address, recipient.address, -1n)).toThrow(
        "amount -1 is outside the uint256 range",
      );
    });
  });

  describe("approve", () => {
    it("should overwrite the previous allowance", () => {
      const { ledger } = genesis();

      ledger.approve(owner.address, spender.address, 200n);
      const events = ledger.approve(owner.address, spender.address, 30n);

      expect(events).toEqual([
        { eventName: "Approval", args: { owner: owner.address, spender: spender.address, value: 30n } },
      ]);
      expect(ledger.allowance(owner.address, spender.address)).toBe(30n);
    });

    it("should not require a balance", () => {
      const { ledger } = genesis();

      ledger.approve(recipient.address, spender.address, 1_000n);
      expect(ledger.allowance(recipient.address, spender.address)).toBe(1_000n);
    });
  });

  describe("transferFrom", () => {
    it("should spend the allowance and move the balance", () => {
      const { ledger } = genesis();
      ledger.approve(owner.address, spender.address, 200n);

      const result = ledger.transferFrom(spender.address, owner.address, recipient.address, 150n);
      assert(result.ok);

      expect(result.value).toEqual([
        { eventName: "Transfer", args: { from: owner.address, to: recipient.address, value: 150n } },
      ]);
      expect(ledger.allowance(owner.address, spender.address)).toBe(50n);
      expect(ledger.balanceOf(recipient.address)).toBe(150n);
    });

    it("should check the allowance before the balance", () => {
      const { ledger } = genesis();

      expect(ledger.transferFrom(spender.address, recipient.address, owner.address, 10n)).toEqual({
        ok: false,
        error: {
          type: "InsufficientAllowance",
          owner: recipient.address,
          spender: spender.address,
          allowance: 0n,
          needed: 10n,
        },
      });
    });

    it("should keep the allowance when the balance is insufficient", () => {
      const { ledger } = genesis();
      ledger.approve(recipient.address, spender.address, 10n);

      const result = ledger.transferFrom(spender.address, recipient.address, owner.address, 10n);
      assert(!result.ok);

      expect(result.error).toEqual({ type: "InsufficientBalance", account: recipient.address, balance: 0n, needed: 10n });
      expect(ledger.allowance(recipient.address, spender.address)).toBe(10n);
    });

    it("should decrement an unlimited allowance", () => {
      const { ledger } = genesis();
      ledger.approve(owner.address, spender.address, MAX_AMOUNT);

      ledger.transferFrom(spender.address, owner.address, recipient.address, 1n);
      expect(ledger.allowance(owner.address, spender.address)).toBe(MAX_AMOUNT - 1n);
    });
  });

  describe("clone", () => {
    it("should copy balances and allowances independently", () => {
      const { ledger } = genesis();
      ledger.approve(owner.address, spender.address, 5n);

      const copy = ledger.clone();
      copy.transfer(owner.address, recipient.address, 1n);
      copy.approve(owner.address, spender.address, 9n);

      expect(ledger.balanceOf(recipient.address)).toBe(0n);
      expect(ledger.allowance(owner.address, spender.address)).toBe(5n);
      expect(copy.balanceOf(recipient.address)).toBe(1n);
      expect(copy.allowance(owner.address, spender.address)).toBe(9n);
    });
  });
});

describe("assertAmount", () => {
  it("should accept the uint256 bounds", () => {
    expect(() => assertAmount(0n)).not.toThrow();
    expect(() => assertAmount(MAX_AMOUNT)).not.toThrow();
  });

  it("should name the value in the error", () => {
    expect(() => assertAmount(MAX_AMOUNT + 1n, "supply")).toThrow(`supply ${MAX_AMOUNT + 1n} is outside the uint256 range`);
  });
});
