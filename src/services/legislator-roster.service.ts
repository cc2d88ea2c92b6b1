import { getAddress, isAddress, type Address } from "viem";
import type { LegislatorSeed } from "../config/index.js";
import type { LegislatorRoster } from "../types/collaborators.js";

/** Roster seeded from configuration; the election process that produces it lives elsewhere. */
export class StaticLegislatorRoster implements LegislatorRoster {
  private readonly weights = new Map<Address, bigint>();

  constructor(seeds: LegislatorSeed[] = []) {
    for (const seed of seeds) this.set(seed.address, seed.weight);
  }

  set(account: string, weight: bigint): void {
    if (!isAddress(account)) throw new Error(`Invalid legislator address: ${account}`);
    if (weight <= 0n) {
      this.weights.delete(getAddress(account));
      return;
    }
    this.weights.set(getAddress(account), weight);
  }

  isLegislator(account: Address): boolean {
    return this.weights.has(getAddress(account));
  }

  getVotingWeight(account: Address): bigint {
    return this.weights.get(getAddress(account)) ?? 0n;
  }

  getLegislators(): Address[] {
    return [...this.weights.keys()];
  }
}
