import {
  decodeErrorResult,
  encodeErrorResult,
  encodeFunctionData,
  erc20Abi,
  parseEventLogs,
  type Address,
  type Hex,
  type Log,
  zeroAddress,
} from "viem";

import { PANIC_ARITHMETIC, tokenErrorsAbi } from "@/lib/abi.js";
import type { IntentCall, TokenIntent } from "@/lib/client/types.js";
import type { RevertReason } from "@/lib/errors.js";
import type { LedgerError, LedgerEvent } from "@/lib/ledger/types.js";
import { sameAddress } from "@/lib/utils.js";
import { logger } from "@/logger.js";

/** Encodes an intent into the call sent to the token (or to the recipient, for a native transfer). */
export const encodeIntent = (token: Address, intent: TokenIntent): IntentCall => {
  switch (intent.type) {
    case "transfer":
      return {
        to: token,
        data: encodeFunctionData({ abi: erc20Abi, functionName: "transfer", args: [intent.to, intent.amount] }),
        value: 0n,
      };
    case "approve":
      return {
        to: token,
        data: encodeFunctionData({ abi: erc20Abi, functionName: "approve", args: [intent.spender, intent.amount] }),
        value: 0n,
      };
    case "transferFrom":
      return {
        to: token,
        data: encodeFunctionData({
          abi: erc20Abi,
          functionName: "transferFrom",
          args: [intent.from, intent.to, intent.amount],
        }),
        value: 0n,
      };
    case "native":
      return { to: intent.to, data: "0x", value: intent.value };
  }
};

/** Encodes a ledger error as the revert data the token contract would return. */
export const encodeRevert = (error: LedgerError): Hex => {
  switch (error.type) {
    case "InsufficientBalance":
      return encodeErrorResult({
        abi: tokenErrorsAbi,
        errorName: "ERC20InsufficientBalance",
        args: [error.account, error.balance, error.needed],
      });
    case "InsufficientAllowance":
      return encodeErrorResult({
        abi: tokenErrorsAbi,
        errorName: "ERC20InsufficientAllowance",
        args: [error.spender, error.allowance, error.needed],
      });
    case "ArithmeticOverflow":
      return encodeErrorResult({ abi: tokenErrorsAbi, errorName: "Panic", args: [PANIC_ARITHMETIC] });
  }
};

/**
 * Decodes revert data into a ledger error when it matches one of the token's errors.
 *
 * `InsufficientAllowance` cannot recover the owner from the revert data, so it is reported as the zero address unless
 * provided.
 */
export const decodeRevert = (data: Hex, context?: { owner?: Address }): RevertReason => {
  if (data === "0x") return { type: "Reverted", data };

  try {
    const decoded = decodeErrorResult({ abi: tokenErrorsAbi, data });
    switch (decoded.errorName) {
      case "ERC20InsufficientBalance": {
        const [account, balance, needed] = decoded.args;
        return { type: "InsufficientBalance", account, balance, needed };
      }
      case "ERC20InsufficientAllowance": {
        const [spender, allowance, needed] = decoded.args;
        const owner = context?.owner ?? zeroAddress;
        return { type: "InsufficientAllowance", owner, spender, allowance, needed };
      }
      case "Panic": {
        const [code] = decoded.args;
        if (code === PANIC_ARITHMETIC) return { type: "ArithmeticOverflow" };
        return { type: "Reverted", data, message: `panic 0x${code.toString(16)}` };
      }
      case "Error":
        return { type: "Reverted", data, message: decoded.args[0] };
    }
  } catch (err) {
    logger.log(`Could not decode revert data ${data}: ${err instanceof Error ? err.message : String(err)}`);
  }

  return { type: "Reverted", data };
};

/** Decodes the `Transfer` and `Approval` logs of a receipt into ledger events. */
export const eventsFromLogs = (logs: Array<Log>, token?: Address): Array<LedgerEvent> => {
  const relevant = token ? logs.filter((log) => sameAddress(log.address, token)) : logs;

  return parseEventLogs({ abi: erc20Abi, logs: relevant }).map((log): LedgerEvent => {
    if (log.eventName === "Transfer") return { eventName: "Transfer", args: { ...log.args } };
    return { eventName: "Approval", args: { ...log.args } };
  });
};
