import { getAddress, type Address } from "viem";
import type { ReputationLedger } from "../types/collaborators.js";

export interface SlashRecord {
  account: Address;
  amount: bigint;
  reason: string;
}

/** In-memory reputation balances. Slashing never takes a balance below zero. */
export class InMemoryReputationLedger implements ReputationLedger {
  private readonly balances = new Map<Address, bigint>();
  private readonly slashes: SlashRecord[] = [];

  credit(account: Address, amount: bigint): void {
    const key = getAddress(account);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(getAddress(account)) ?? 0n;
  }

  slash(account: Address, amount: bigint, reason: string): void {
    const key = getAddress(account);
    const balance = this.balances.get(key) ?? 0n;
    const applied = amount > balance ? balance : amount;
    this.balances.set(key, balance - applied);
    this.slashes.push({ account: key, amount: applied, reason });
  }

  history(): SlashRecord[] {
    return [...this.slashes];
  }
}
