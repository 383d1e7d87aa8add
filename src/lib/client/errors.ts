import { HttpRequestError, isHex, TimeoutError, WebSocketRequestError, type Address, type Hex } from "viem";

import { decodeRevert } from "@/lib/codec.js";
import type { NetworkFailure, RevertReason, SubmissionError } from "@/lib/errors.js";

/** Node messages that mean the nonce was refused */
const NONCE_ERROR = /nonce too (low|high)|already known|replacement transaction underpriced|invalid nonce/i;

/** Maximum depth when walking the `cause` chain */
const MAX_CAUSE_DEPTH = 16;

/** The error followed by its causes, outermost first. */
export const errorChain = (error: unknown): Array<unknown> => {
  const chain: Array<unknown> = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && chain.length < MAX_CAUSE_DEPTH) {
    chain.push(current);
    current = typeof current === "object" && "cause" in current ? current.cause : undefined;
  }
  return chain;
};

export const messageOf = (error: unknown): string | undefined => {
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string")
    return error.message;
  return undefined;
};

/** Socket error codes of a connection that failed or broke */
const CONNECTION_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "EPIPE"]);

const hasConnectionCode = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  typeof error.code === "string" &&
  CONNECTION_ERROR_CODES.has(error.code);

/** Whether the request failed before the node could answer it. */
export const isNetworkError = (error: unknown): boolean =>
  errorChain(error).some(
    (cause) =>
      cause instanceof HttpRequestError ||
      cause instanceof TimeoutError ||
      cause instanceof WebSocketRequestError ||
      hasConnectionCode(cause),
  );

export const toNetworkFailure = (error: unknown): NetworkFailure => ({
  type: "NetworkFailure",
  message: messageOf(errorChain(error).at(-1)) ?? String(error),
});

/**
 * Maps a failed `eth_sendRawTransaction` to a submission error.
 *
 * The innermost message is the node's own answer (viem wraps it in its RPC error classes).
 */
export const classifySubmissionError = (error: unknown, nonce: number): SubmissionError => {
  if (isNetworkError(error)) return toNetworkFailure(error);

  const chain = errorChain(error);
  const messages = chain.map(messageOf).filter((message): message is string => message !== undefined);
  const message = messages.at(-1) ?? String(error);

  if (messages.some((m) => NONCE_ERROR.test(m))) return { type: "InvalidNonce", nonce, message };
  return { type: "Rejected", message };
};

/** Finds the revert data a node attached to a failed call, if any. */
export const findRevertData = (error: unknown): Hex | undefined => {
  for (const cause of errorChain(error)) {
    if (typeof cause !== "object" || cause === null || !("data" in cause)) continue;
    const { data } = cause;
    if (typeof data === "string" && isHex(data)) return data;
    if (typeof data === "object" && data !== null && "data" in data && typeof data.data === "string" && isHex(data.data))
      return data.data;
  }
  return undefined;
};

/** Decodes why a call reverted; `undefined` when the error is not a revert. */
export const revertReasonOf = (error: unknown, context?: { owner?: Address }): RevertReason | undefined => {
  const data = findRevertData(error);
  if (data !== undefined) return decodeRevert(data, context);

  const reverted = errorChain(error).some((cause) => /revert/i.test(messageOf(cause) ?? ""));
  return reverted ? { type: "Reverted", data: "0x", message: messageOf(error) } : undefined;
};
