/**
 * In-memory protocol state. Every component reads and writes through one shared
 * `ProtocolState` object so an operation can be rolled back by restoring a snapshot.
 */

import type { Address } from "viem";
import { ValidationError } from "./errors.js";
import type {
  Dispute,
  EvidenceChallenge,
  LegislatorVoteCommit,
  ProtocolMetrics,
  Resolution,
  ResolutionCommit,
  Stake,
  TreasuryState,
} from "../../types/resolution.js";

/** Everything recorded for one proposal cycle of a market. */
export interface RoundState {
  resolution: Resolution;
  supportStakes: Map<Address, Stake>;
  oppositionStakes: Map<Address, Stake>;
  disputes: Dispute[];
  /** Keyed by disputeStakeKey(index, supporter). */
  disputeStakes: Map<string, Stake>;
  /** disputeStakeKey(index, legislator) of every endorsement given. */
  endorsements: Set<string>;
  /** Legislator roster frozen at proposal time, with voting weight. */
  roster: Map<Address, bigint>;
  legislatorVotes: Map<Address, LegislatorVoteCommit>;
  evidenceChallenges: EvidenceChallenge[];
}

export interface ProtocolState {
  rounds: Map<string, RoundState[]>;
  /** Keyed by commitKey(marketId, committer). */
  commits: Map<string, ResolutionCommit>;
  lastCommitAt: Map<Address, number>;
  treasury: TreasuryState;
  metrics: ProtocolMetrics;
}

export function createProtocolState(): ProtocolState {
  return {
    rounds: new Map(),
    commits: new Map(),
    lastCommitAt: new Map(),
    treasury: {
      custodied: 0n,
      earmarked: 0n,
      earmarkedByMarket: new Map(),
      protocolFees: 0n,
    },
    metrics: {
      resolutionsProposed: 0,
      disputesFiled: 0,
      commitsSlashed: 0,
      legislatorsSlashed: 0,
      totalFeesCollected: 0n,
      totalSlashed: 0n,
      totalPaidOut: 0n,
    },
  };
}

export function commitKey(marketId: string, committer: Address): string {
  return JSON.stringify([marketId, committer]);
}

export function disputeStakeKey(index: number, account: Address): string {
  return JSON.stringify([index, account]);
}

export function snapshotState(state: ProtocolState): ProtocolState {
  return structuredClone(state);
}

/** Restore in place so components holding the root reference see the restored data. */
export function restoreState(target: ProtocolState, snapshot: ProtocolState): void {
  target.rounds = snapshot.rounds;
  target.commits = snapshot.commits;
  target.lastCommitAt = snapshot.lastCommitAt;
  target.treasury = snapshot.treasury;
  target.metrics = snapshot.metrics;
}

export function getRounds(state: ProtocolState, marketId: string): RoundState[] {
  return state.rounds.get(marketId) ?? [];
}

export function latestRound(state: ProtocolState, marketId: string): RoundState | undefined {
  const rounds = getRounds(state, marketId);
  return rounds[rounds.length - 1];
}

/** Resolve a round by number, or the latest round when omitted. */
export function requireRound(state: ProtocolState, marketId: string, round?: number): RoundState {
  const rounds = getRounds(state, marketId);
  const found = round === undefined ? rounds[rounds.length - 1] : rounds[round];
  if (found === undefined) {
    throw new ValidationError(
      round === undefined ? `No resolution for market ${marketId}` : `No resolution round ${round} for market ${marketId}`,
      "NOT_FOUND"
    );
  }
  return found;
}

export function requireDispute(roundState: RoundState, index: number): Dispute {
  const dispute = roundState.disputes[index];
  if (dispute === undefined) {
    throw new ValidationError(`Dispute ${index} not found`, "NOT_FOUND");
  }
  return dispute;
}

export function hasActiveDispute(roundState: RoundState): boolean {
  return roundState.disputes.some((d) => d.status === "ACTIVE");
}
