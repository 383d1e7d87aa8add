import { zeroAddress, type Address } from "viem";

import { addAmounts, assertAmount, subAmounts, type Amount } from "@/lib/amount.js";
import { AddressMap } from "@/lib/ledger/address-map.js";
import type { GenesisOptions, LedgerError, LedgerEvent, TokenMetadata } from "@/lib/ledger/types.js";
import { err, ok, type Result } from "@/lib/result.js";
import { sameAddress } from "@/lib/utils.js";

/**
 * ERC20 balance and allowance state machine.
 *
 * Every transition is atomic: new values are computed first and written only once all checks passed, so a failing call
 * leaves the ledger exactly as it was.
 *
 * @example
 *   const ledger = TokenLedger.genesis({ name: "MyToken", symbol: "MTK", decimals: 18, totalSupply, holder: owner });
 *   const result = ledger.transfer(owner, other, 100n);
 *   if (!result.ok) console.log(result.error.type); // "InsufficientBalance"
 */
export class TokenLedger {
  private readonly balances = new AddressMap<Amount>();
  private readonly allowances = new AddressMap<AddressMap<Amount>>();

  private constructor(private readonly meta: TokenMetadata) {}

  /**
   * Creates a ledger and mints the entire supply to `holder`.
   *
   * @returns The ledger and the mint `Transfer` event (from the zero address).
   */
  static genesis(options: GenesisOptions): { ledger: TokenLedger; events: Array<LedgerEvent> } {
    const { holder, ...meta } = options;
    assertAmount(meta.totalSupply, "totalSupply");
    if (!Number.isInteger(meta.decimals) || meta.decimals < 0 || meta.decimals > 255)
      throw new RangeError(`decimals ${meta.decimals} is not a uint8`);

    const ledger = new TokenLedger(meta);
    ledger.balances.set(holder, meta.totalSupply);

    return {
      ledger,
      events: [{ eventName: "Transfer", args: { from: zeroAddress, to: holder, value: meta.totalSupply } }],
    };
  }

  metadata(): TokenMetadata {
    return { ...this.meta };
  }

  totalSupply(): Amount {
    return this.meta.totalSupply;
  }

  balanceOf(account: Address): Amount {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: Address, spender: Address): Amount {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  /** Accounts that were credited at least once (including those back at zero). */
  holders(): Array<Address> {
    return [...this.balances.keys()];
  }

  /** Whether the balances add up to the total supply. */
  checkSupply(): boolean {
    let sum = 0n;
    for (const balance of this.balances.values()) sum += balance;
    return sum === this.meta.totalSupply;
  }

  transfer(from: Address, to: Address, amount: Amount): Result<Array<LedgerEvent>, LedgerError> {
    assertAmount(amount);

    const applied = this.move(from, to, amount);
    if (!applied.ok) return applied;

    return ok([{ eventName: "Transfer", args: { from, to, value: amount } }]);
  }

  /** Overwrites the allowance; it is not added to the previous one. */
  approve(owner: Address, spender: Address, amount: Amount): Array<LedgerEvent> {
    assertAmount(amount);

    const spenders = this.allowances.get(owner) ?? new AddressMap<Amount>();
    spenders.set(spender, amount);
    this.allowances.set(owner, spenders);

    return [{ eventName: "Approval", args: { owner, spender, value: amount } }];
  }

  /** Spends `amount` of the allowance `owner` granted to `spender`, moving it from `owner` to `to`. */
  transferFrom(spender: Address, owner: Address, to: Address, amount: Amount): Result<Array<LedgerEvent>, LedgerError> {
    assertAmount(amount);

    const allowance = this.allowance(owner, spender);
    const nextAllowance = subAmounts(allowance, amount);
    if (nextAllowance === undefined)
      return err({ type: "InsufficientAllowance", owner, spender, allowance, needed: amount });

    // Balances are only written if the move succeeds, and the allowance right after
    const applied = this.move(owner, to, amount);
    if (!applied.ok) return applied;

    const spenders = this.allowances.get(owner) ?? new AddressMap<Amount>();
    spenders.set(spender, nextAllowance);
    this.allowances.set(owner, spenders);

    return ok([{ eventName: "Transfer", args: { from: owner, to, value: amount } }]);
  }

  /** Deep copy, used for historical state and call-only execution. */
  clone(): TokenLedger {
    const copy = new TokenLedger({ ...this.meta });
    for (const [account, balance] of this.balances) copy.balances.set(account, balance);
    for (const [owner, spenders] of this.allowances) copy.allowances.set(owner, new AddressMap<Amount>(spenders));
    return copy;
  }

  private move(from: Address, to: Address, amount: Amount): Result<void, LedgerError> {
    const balance = this.balanceOf(from);
    const nextFrom = subAmounts(balance, amount);
    if (nextFrom === undefined) return err({ type: "InsufficientBalance", account: from, balance, needed: amount });

    // Self-transfer: valid, no balance change
    if (sameAddress(from, to)) return ok(undefined);

    const nextTo = addAmounts(this.balanceOf(to), amount);
    if (nextTo === undefined) return err({ type: "ArithmeticOverflow" });

    this.balances.set(from, nextFrom);
    this.balances.set(to, nextTo);
    return ok(undefined);
  }
}
