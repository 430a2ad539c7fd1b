/**
 * In-memory settlement token: balances plus spender allowances.
 */

import type { Address, SettlementToken } from "@roundfeed/types";
import { assertAmount, checkedAdd } from "@roundfeed/ledger";
import { normalizeAddress } from "./address.js";
import { AggregatorError } from "./types.js";

export class InMemorySettlementToken implements SettlementToken {
  private readonly _balances = new Map<Address, bigint>();
  private readonly _allowances = new Map<string, bigint>();
  private _totalSupply = 0n;

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(owner: Address): bigint {
    return this._balances.get(normalizeAddress(owner)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  mint(to: Address, amount: bigint): void {
    assertAmount(amount);
    const account = normalizeAddress(to);
    this._balances.set(account, checkedAdd(this.balanceOf(account), amount));
    this._totalSupply = checkedAdd(this._totalSupply, amount);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    assertAmount(amount);
    this._allowances.set(allowanceKey(owner, spender), amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    this.move(normalizeAddress(from), normalizeAddress(to), amount);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    const key = allowanceKey(from, spender);
    const allowed = this._allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new AggregatorError(
        "INSUFFICIENT_ALLOWANCE",
        `${spender} may move ${allowed.toString()} from ${from}, not ${amount.toString()}`,
      );
    }
    this.move(normalizeAddress(from), normalizeAddress(to), amount);
    this._allowances.set(key, allowed - amount);
  }

  private move(from: Address, to: Address, amount: bigint): void {
    const balance = this._balances.get(from) ?? 0n;
    if (balance < amount) {
      throw new AggregatorError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${balance.toString()}, cannot send ${amount.toString()}`,
      );
    }
    this._balances.set(from, balance - amount);
    this._balances.set(to, (this._balances.get(to) ?? 0n) + amount);
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${normalizeAddress(owner)}:${normalizeAddress(spender)}`;
}
