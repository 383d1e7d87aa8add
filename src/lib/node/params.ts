import { hexToBigInt, isAddress, isHex, type Address, type Hex } from "viem";

import { invalidParams } from "@/lib/node/errors.js";
import type { CallRequest } from "@/lib/node/types.js";

export type BlockTag = "latest" | bigint;

export const paramsArray = (params: unknown): Array<unknown> => {
  if (params === undefined) return [];
  if (!Array.isArray(params)) throw invalidParams("params must be an array");
  return params;
};

export const readHex = (value: unknown, name: string): Hex => {
  if (typeof value !== "string" || !isHex(value)) throw invalidParams(`${name} must be a hex string`);
  return value;
};

export const readAddress = (value: unknown, name: string): Address => {
  if (typeof value !== "string" || !isAddress(value, { strict: false })) throw invalidParams(`${name} must be an address`);
  return value;
};

export const readQuantity = (value: unknown, name: string): bigint => hexToBigInt(readHex(value, name));

/** Named tags all resolve to the latest block, except `earliest` */
export const readBlockTag = (value: unknown): BlockTag => {
  if (value === undefined || value === "latest" || value === "pending" || value === "safe" || value === "finalized")
    return "latest";
  if (value === "earliest") return 0n;
  if (typeof value === "object" && value !== null && "blockNumber" in value)
    return readQuantity(value.blockNumber, "blockNumber");
  return readQuantity(value, "block");
};

/** Only the call tracer is served; it is also the default */
export const assertCallTracer = (value: unknown): void => {
  if (typeof value !== "object" || value === null || !("tracer" in value) || value.tracer === undefined) return;
  if (value.tracer !== "callTracer") throw invalidParams(`tracer ${String(value.tracer)} is not supported`);
};

export const readCallRequest = (value: unknown): CallRequest => {
  if (typeof value !== "object" || value === null) throw invalidParams("call request must be an object");
  const request: Record<string, unknown> = Object.fromEntries(Object.entries(value));

  return {
    from: request.from === undefined || request.from === null ? undefined : readAddress(request.from, "from"),
    to: request.to === undefined || request.to === null ? undefined : readAddress(request.to, "to"),
    data: readHex(request.data ?? request.input ?? "0x", "data"),
    value: request.value === undefined ? 0n : readQuantity(request.value, "value"),
  };
};
