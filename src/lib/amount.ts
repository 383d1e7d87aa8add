import { maxUint256 } from "viem";

/** Token quantity with uint256 semantics. */
export type Amount = bigint;

export const MAX_AMOUNT: Amount = maxUint256;

export const isAmount = (value: bigint): boolean => value >= 0n && value <= MAX_AMOUNT;

/**
 * Throws if the value cannot be represented as a uint256.
 *
 * Such a value can never reach the ledger through the ABI, so this is a programming error rather than a revert.
 */
export const assertAmount = (value: bigint, label = "amount"): void => {
  if (!isAmount(value)) throw new RangeError(`${label} ${value} is outside the uint256 range`);
};

/** Checked addition; `undefined` on overflow. */
export const addAmounts = (a: Amount, b: Amount): Amount | undefined => {
  const sum = a + b;
  return sum > MAX_AMOUNT ? undefined : sum;
};

/** Checked subtraction; `undefined` on underflow. */
export const subAmounts = (a: Amount, b: Amount): Amount | undefined => (a < b ? undefined : a - b);
