import { HttpRequestError } from "viem";
import { describe, expect, it } from "vitest";

import { ACCOUNTS } from "@test/constants.js";
import { classifySubmissionError, isNetworkError, revertReasonOf } from "@/lib/client/errors.js";
import { encodeRevert } from "@/lib/codec.js";
import { describeError } from "@/lib/errors.js";

const { owner, spender } = ACCOUNTS;

const unreachable = () => new HttpRequestError({ url: "http://localhost:8545", details: "connect ECONNREFUSED" });

describe("classifySubmissionError", () => {
  it("should detect a transport failure anywhere in the cause chain", () => {
    const error = new Error("request failed", { cause: unreachable() });

    expect(isNetworkError(error)).toBe(true);
    expect(classifySubmissionError(error, 0).type).toBe("NetworkFailure");
  });

  it("should detect a plain connection error by its code", () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:8545"), { code: "ECONNREFUSED" });
    const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });

    expect(classifySubmissionError(new TypeError("fetch failed", { cause: refused }), 0)).toEqual({
      type: "NetworkFailure",
      message: "connect ECONNREFUSED 127.0.0.1:8545",
    });
    expect(isNetworkError(reset)).toBe(true);
  });

  it("should not treat a node error code as a connection failure", () => {
    const error = Object.assign(new Error("insufficient funds for gas * price + value"), { code: -32000 });

    expect(isNetworkError(error)).toBe(false);
    expect(classifySubmissionError(error, 0).type).toBe("Rejected");
  });

  it("should report a refused nonce with the node's message", () => {
    const error = new Error("Missing or invalid parameters.", {
      cause: new Error("nonce too low: next nonce 2, tx nonce 1"),
    });

    expect(classifySubmissionError(error, 1)).toEqual({
      type: "InvalidNonce",
      nonce: 1,
      message: "nonce too low: next nonce 2, tx nonce 1",
    });
  });

  it("should treat a duplicate submission as a nonce error", () => {
    expect(classifySubmissionError(new Error("already known"), 4)).toEqual({
      type: "InvalidNonce",
      nonce: 4,
      message: "already known",
    });
  });

  it("should report any other refusal as rejected", () => {
    expect(classifySubmissionError(new Error("invalid chain id: expected 31337, got 1"), 0)).toEqual({
      type: "Rejected",
      message: "invalid chain id: expected 31337, got 1",
    });
  });
});

describe("revertReasonOf", () => {
  it("should decode revert data attached to a cause", () => {
    const data = encodeRevert({
      type: "InsufficientAllowance",
      owner: owner.address,
      spender: spender.address,
      allowance: 0n,
      needed: 1n,
    });
    const error = new Error("Execution reverted", { cause: { message: "execution reverted", data } });

    expect(revertReasonOf(error, { owner: owner.address })).toEqual({
      type: "InsufficientAllowance",
      owner: owner.address,
      spender: spender.address,
      allowance: 0n,
      needed: 1n,
    });
  });

  it("should report a revert without data as an empty revert", () => {
    expect(revertReasonOf(new Error("execution reverted"))).toEqual({
      type: "Reverted",
      data: "0x",
      message: "execution reverted",
    });
  });

  it("should ignore errors that are not reverts", () => {
    expect(revertReasonOf(new Error("header not found"))).toBeUndefined();
  });
});

describe("describeError", () => {
  it("should describe ledger and submission errors", () => {
    expect(describeError({ type: "InsufficientBalance", account: owner.address, balance: 1n, needed: 2n })).toBe(
      `insufficient balance: ${owner.address} has 1, needs 2`,
    );
    expect(describeError({ type: "PredictedRevert", reason: { type: "ArithmeticOverflow" } })).toBe(
      "simulation reverted (arithmetic overflow)",
    );
    expect(describeError({ type: "InvalidNonce", nonce: 3, message: "already known" })).toBe(
      "invalid nonce 3: already known",
    );
  });
});
