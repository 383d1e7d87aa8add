import type { Abi } from "abitype";
import { erc20Abi } from "viem";

/** Custom errors the ledger reverts with, plus the Solidity built-ins. */
export const tokenErrorsAbi = [
  {
    type: "error",
    name: "ERC20InsufficientBalance",
    inputs: [
      { name: "sender", type: "address" },
      { name: "balance", type: "uint256" },
      { name: "needed", type: "uint256" },
    ],
  },
  {
    type: "error",
    name: "ERC20InsufficientAllowance",
    inputs: [
      { name: "spender", type: "address" },
      { name: "allowance", type: "uint256" },
      { name: "needed", type: "uint256" },
    ],
  },
  { type: "error", name: "Error", inputs: [{ name: "message", type: "string" }] },
  { type: "error", name: "Panic", inputs: [{ name: "code", type: "uint256" }] },
] as const satisfies Abi;

export const tokenAbi = [...erc20Abi, ...tokenErrorsAbi] as const;

/** Solidity panic code for arithmetic overflow/underflow */
export const PANIC_ARITHMETIC = 0x11n;
