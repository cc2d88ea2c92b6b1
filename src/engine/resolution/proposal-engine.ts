/**
 * Commit-reveal proposal of a market outcome.
 *
 * commit (bonded) -> wait MIN_REVEAL_DELAY -> reveal before MAX_REVEAL_DELAY, or be slashed.
 * The reveal creates a new resolution round and freezes the legislator roster for it.
 */

import type { Address } from "viem";
import {
  BPS,
  COMMIT_COOLDOWN,
  MAX_EVIDENCE_URI_LENGTH,
  MAX_REVEAL_DELAY,
  MIN_COMMIT_BOND,
  MIN_PROPOSAL_STAKE,
  MIN_REVEAL_DELAY,
  UNREVEALED_SLASH_BOUNTY_BPS,
} from "./constants.js";
import {
  requireAddress,
  requireBytes32,
  requireEvidence,
  requireNonZeroBytes32,
  requireOutcome,
  resolutionCommitment,
} from "./commitments.js";
import { requireMinimumValue, requireNoValue, requireWindow, type ProtocolContext } from "./context.js";
import { ValidationError, ensure } from "./errors.js";
import { hasUnresolvedChallenges } from "./evidence-challenges.js";
import { commitKey, latestRound, type RoundState } from "./protocol-state.js";
import { proposerTimingBonus, weightByBonus } from "./timing-bonus.js";
import type { CallContext, Resolution, ResolutionCommit } from "../../types/resolution.js";

export interface ProposeInput {
  outcome: number;
  evidenceUri: string;
  evidenceHash: string;
  salt: string;
}

export function requireMarketId(marketId: string): string {
  if (marketId.trim().length === 0) throw new ValidationError("marketId is required");
  return marketId;
}

export class ProposalEngine {
  constructor(private readonly ctx: ProtocolContext) {}

  commitResolution(call: CallContext, marketId: string, commitHash: string): ResolutionCommit {
    requireMarketId(marketId);
    const { state, clock, ledger, market } = this.ctx;
    const hash = requireNonZeroBytes32(commitHash, "Commit hash");
    const bond = requireMinimumValue(call, MIN_COMMIT_BOND, "Commit bond");
    const phase = market.getResolutionState(marketId);
    ensure(phase === "SETTLEMENT", `Market ${marketId} is not in settlement (state ${phase})`);

    const key = commitKey(marketId, call.sender);
    const existing = state.commits.get(key);
    ensure(
      existing === undefined || existing.revealed || existing.slashed,
      "A pending commit already exists for this market"
    );

    const now = clock.now();
    const lastCommit = state.lastCommitAt.get(call.sender);
    ensure(
      lastCommit === undefined || now >= lastCommit + COMMIT_COOLDOWN,
      "Commit cooldown has not elapsed"
    );

    ledger.receive(marketId, call.sender, bond);
    const commit: ResolutionCommit = {
      marketId,
      committer: call.sender,
      commitHash: hash,
      committedAt: now,
      bond,
      revealed: false,
      slashed: false,
    };
    state.commits.set(key, commit);
    state.lastCommitAt.set(call.sender, now);

    this.ctx.emit({ type: "ResolutionCommitted", marketId, committer: call.sender, bond });
    return { ...commit };
  }

  proposeResolution(call: CallContext, marketId: string, input: ProposeInput): Resolution {
    requireMarketId(marketId);
    const { state, clock, ledger, market, roster } = this.ctx;
    const now = clock.now();

    const commit = state.commits.get(commitKey(marketId, call.sender));
    ensure(commit !== undefined && !commit.revealed && !commit.slashed, "No pending commit to reveal");
    requireWindow(now >= commit.committedAt + MIN_REVEAL_DELAY, "Reveal is too early");
    requireWindow(now <= commit.committedAt + MAX_REVEAL_DELAY, "Reveal deadline has passed");

    const evidenceHash = requireBytes32(input.evidenceHash, "Evidence hash");
    const salt = requireBytes32(input.salt, "Salt");
    const recomputed = resolutionCommitment(input.outcome, input.evidenceUri, evidenceHash, salt, call.sender);
    ensure(recomputed === commit.commitHash.toLowerCase(), "Reveal does not match the commitment");

    const info = market.getMarketInfo(marketId);
    const outcome = requireOutcome(input.outcome, info.outcomeCount);
    const evidence = requireEvidence(input.evidenceUri, evidenceHash, MAX_EVIDENCE_URI_LENGTH);
    const stake = requireMinimumValue(call, MIN_PROPOSAL_STAKE, "Proposal stake");
    ensure(now >= info.tradingEnd, "Market trading period has not ended");

    const previous = latestRound(state, marketId);
    ensure(
      previous === undefined || previous.resolution.status === "REJECTED",
      `Market ${marketId} already has a live resolution`
    );
    ensure(
      previous === undefined || !hasUnresolvedChallenges(previous),
      "Evidence challenges on the previous round are still unresolved"
    );

    commit.revealed = true;
    ledger.receive(marketId, call.sender, stake);
    ledger.release(marketId, call.sender, commit.bond);

    const proposerBonusBps = proposerTimingBonus(info.tradingEnd, now);
    const rounds = state.rounds.get(marketId) ?? [];
    const resolution: Resolution = {
      marketId,
      round: rounds.length,
      proposer: call.sender,
      proposedOutcome: outcome,
      proposedAt: now,
      evidence,
      supportStake: stake,
      weightedSupportStake: weightByBonus(stake, proposerBonusBps),
      oppositionStake: 0n,
      supportCount: 1,
      oppositionCount: 0,
      legislatorSupportVotes: 0,
      legislatorOppositionVotes: 0,
      status: "PENDING",
      disputed: false,
      finalized: false,
      finalizedAt: null,
      finalOutcome: null,
      proposerBonusBps,
      rejectedByEvidence: false,
      evidencePenaltyPaid: 0n,
      settlement: null,
    };

    const snapshot = new Map<Address, bigint>();
    for (const legislator of roster.getLegislators()) {
      snapshot.set(requireAddress(legislator, "legislator"), roster.getVotingWeight(legislator));
    }

    const roundState: RoundState = {
      resolution,
      supportStakes: new Map([
        [
          call.sender,
          {
            amount: stake,
            weightedAmount: resolution.weightedSupportStake,
            timingBonusBps: proposerBonusBps,
            lastContributionAt: now,
            withdrawn: false,
          },
        ],
      ]),
      oppositionStakes: new Map(),
      disputes: [],
      disputeStakes: new Map(),
      endorsements: new Set(),
      roster: snapshot,
      legislatorVotes: new Map(),
      evidenceChallenges: [],
    };
    rounds.push(roundState);
    state.rounds.set(marketId, rounds);
    state.metrics.resolutionsProposed += 1;

    this.bindPriceReference(marketId);
    this.ctx.notifier.markProposed(marketId);

    this.ctx.emit({
      type: "ResolutionProposed",
      marketId,
      round: resolution.round,
      proposer: call.sender,
      outcome,
      stake,
      proposerBonusBps,
      rosterSize: snapshot.size,
    });
    return { ...resolution };
  }

  slashUnrevealedCommit(call: CallContext, marketId: string, committer: string): bigint {
    requireNoValue(call);
    const account = requireAddress(committer, "committer");
    const { state, clock, ledger } = this.ctx;
    const commit = state.commits.get(commitKey(marketId, account));
    if (commit === undefined) throw new ValidationError("No commit to slash", "NOT_FOUND");
    ensure(!commit.revealed, "Commit was revealed");
    ensure(!commit.slashed, "Commit was already slashed");
    ensure(clock.now() > commit.committedAt + MAX_REVEAL_DELAY, "Reveal deadline has not passed");

    commit.slashed = true;
    const bounty = (commit.bond * UNREVEALED_SLASH_BOUNTY_BPS) / BPS;
    ledger.forfeit(marketId, commit.bond - bounty);
    if (bounty > 0n) ledger.release(marketId, call.sender, bounty);
    state.metrics.commitsSlashed += 1;

    this.ctx.emit({ type: "UnrevealedCommitSlashed", marketId, committer: account, slasher: call.sender, bounty });
    return bounty;
  }

  getCommit(marketId: string, committer: string): ResolutionCommit | null {
    const commit = this.ctx.state.commits.get(commitKey(marketId, requireAddress(committer, "committer")));
    return commit === undefined ? null : { ...commit };
  }

  private bindPriceReference(marketId: string): void {
    const { priceOracle, market, isolator } = this.ctx;
    if (priceOracle === null || market.getPriceFeedId === undefined) return;
    isolator.defer(() => {
      isolator.call("priceOracle", "recordPrice", marketId, () => {
        const feedId = market.getPriceFeedId?.(marketId) ?? null;
        if (feedId === null) return;
        const asset = market.getPriceAsset?.(marketId) ?? feedId;
        priceOracle.recordPrice(marketId, feedId, asset);
      });
    });
  }
}
