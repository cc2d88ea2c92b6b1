/**
 * Account balances the protocol collects stakes from and pays rewards to.
 * Operators fund accounts through POST /api/internal/accounts/:address/credit.
 */

import { getAddress, type Address } from "viem";
import { ValidationError } from "../engine/resolution/errors.js";
import type { FundsGateway } from "../types/collaborators.js";

export class CustodyFundsGateway implements FundsGateway {
  private readonly balances = new Map<Address, bigint>();

  credit(account: Address, amount: bigint): bigint {
    if (amount <= 0n) throw new ValidationError("Credit amount must be positive");
    const key = getAddress(account);
    const next = (this.balances.get(key) ?? 0n) + amount;
    this.balances.set(key, next);
    return next;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(getAddress(account)) ?? 0n;
  }

  collect(from: Address, amount: bigint): void {
    const key = getAddress(from);
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) {
      throw new ValidationError(`Insufficient balance: ${key} has ${balance}, needs ${amount}`);
    }
    this.balances.set(key, balance - amount);
  }

  transfer(to: Address, amount: bigint): void {
    const key = getAddress(to);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }
}
