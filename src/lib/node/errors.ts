import type { Hex } from "viem";

/** JSON-RPC error codes answered by the node */
export const RPC_ERROR = {
  EXECUTION_REVERTED: 3,
  SERVER: -32000,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
} as const;

/** Error carrying a JSON-RPC error object, the way a remote node would answer. */
export class NodeRpcError extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly data?: Hex,
  ) {
    super(message);
    this.name = "NodeRpcError";
  }
}

export const rejected = (message: string): NodeRpcError => new NodeRpcError(RPC_ERROR.SERVER, message);

export const invalidParams = (message: string): NodeRpcError => new NodeRpcError(RPC_ERROR.INVALID_PARAMS, message);

export const reverted = (data: Hex): NodeRpcError =>
  new NodeRpcError(RPC_ERROR.EXECUTION_REVERTED, "execution reverted", data);
