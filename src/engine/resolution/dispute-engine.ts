/**
 * Bonded disputes against a live resolution, with staked supporters and legislator
 * endorsements. Disputes are scored against the resolution only at finalization.
 */

import {
  DISPUTE_PERIOD,
  MAX_DISPUTES,
  MAX_EVIDENCE_URI_LENGTH,
  MIN_STAKE,
} from "./constants.js";
import { requireAddress, requireEvidence, requireOutcome } from "./commitments.js";
import { requireMinimumValue, requireNoValue, requireWindow, type ProtocolContext } from "./context.js";
import { computeScore, selectWinningDispute } from "./dispute-scoring.js";
import { ValidationError, ensure } from "./errors.js";
import { disputeStakeKey, requireDispute, requireRound, type RoundState } from "./protocol-state.js";
import { requiredDisputeBond } from "./timing-bonus.js";
import type { CallContext, Dispute, DisputeOutcomePreview, Stake } from "../../types/resolution.js";

export interface DisputeInput {
  alternativeOutcome: number;
  evidenceUri: string;
  evidenceHash: string;
}

/** Score the round's resolution and every ACTIVE dispute, and pick the winner if any. */
export function scoreRound(roundState: RoundState): DisputeOutcomePreview {
  const resolution = roundState.resolution;
  const resolutionScore = computeScore({
    stake: resolution.supportStake,
    backers: resolution.supportCount,
    votes: resolution.legislatorSupportVotes,
  });
  const disputeScores = roundState.disputes
    .filter((d) => d.status === "ACTIVE")
    .map((d) => ({
      index: d.index,
      score: computeScore({
        stake: d.bond + d.supportStake,
        backers: 1 + d.supporterCount,
        votes: d.endorsementCount,
      }),
    }));
  return {
    resolutionScore,
    disputeScores,
    winningDisputeIndex: selectWinningDispute(resolutionScore, disputeScores),
  };
}

export class DisputeEngine {
  constructor(private readonly ctx: ProtocolContext) {}

  disputeResolution(call: CallContext, marketId: string, input: DisputeInput): Dispute {
    const roundState = requireRound(this.ctx.state, marketId);
    const resolution = roundState.resolution;
    const now = this.ctx.clock.now();
    ensure(!resolution.finalized && resolution.status !== "REJECTED", "Resolution cannot be disputed");
    this.requireDisputeWindow(roundState, now);

    const info = this.ctx.market.getMarketInfo(marketId);
    const alternativeOutcome = requireOutcome(input.alternativeOutcome, info.outcomeCount);
    ensure(alternativeOutcome !== resolution.proposedOutcome, "Dispute must propose a different outcome");
    const evidence = requireEvidence(input.evidenceUri, input.evidenceHash, MAX_EVIDENCE_URI_LENGTH);
    ensure(roundState.disputes.length < MAX_DISPUTES, `At most ${MAX_DISPUTES} disputes per resolution`);
    const bond = requireMinimumValue(
      call,
      requiredDisputeBond(resolution.supportStake, now - resolution.proposedAt),
      "Dispute bond"
    );

    this.ctx.ledger.receive(marketId, call.sender, bond);
    const dispute: Dispute = {
      index: roundState.disputes.length,
      challenger: call.sender,
      alternativeOutcome,
      bond,
      supportStake: 0n,
      supporterCount: 0,
      endorsementCount: 0,
      status: "ACTIVE",
      evidence,
      createdAt: now,
      challengerWithdrawn: false,
      challengerBonus: 0n,
      supporterRewardRate: 0n,
    };
    roundState.disputes.push(dispute);
    const firstDispute = !resolution.disputed;
    resolution.disputed = true;
    this.ctx.state.metrics.disputesFiled += 1;
    if (firstDispute) this.ctx.notifier.markDisputed(marketId);

    this.ctx.emit({
      type: "DisputeFiled",
      marketId,
      round: resolution.round,
      index: dispute.index,
      challenger: call.sender,
      alternativeOutcome,
      bond,
    });
    return { ...dispute };
  }

  supportDispute(call: CallContext, marketId: string, index: number): Stake {
    const roundState = requireRound(this.ctx.state, marketId);
    const dispute = requireDispute(roundState, index);
    const now = this.ctx.clock.now();
    ensure(dispute.status === "ACTIVE", `Dispute ${index} is not active`);
    this.requireDisputeWindow(roundState, now);
    ensure(dispute.challenger !== call.sender, "Challenger cannot support their own dispute");
    const amount = requireMinimumValue(call, MIN_STAKE, "Dispute support");

    this.ctx.ledger.receive(marketId, call.sender, amount);
    const key = disputeStakeKey(index, call.sender);
    let stake = roundState.disputeStakes.get(key);
    if (stake === undefined) {
      stake = { amount, weightedAmount: amount, timingBonusBps: 0n, lastContributionAt: now, withdrawn: false };
      roundState.disputeStakes.set(key, stake);
      dispute.supporterCount += 1;
    } else {
      stake.amount += amount;
      stake.weightedAmount += amount;
      stake.lastContributionAt = now;
    }
    dispute.supportStake += amount;

    this.ctx.emit({
      type: "DisputeSupported",
      marketId,
      round: roundState.resolution.round,
      index,
      supporter: call.sender,
      amount,
    });
    return { ...stake };
  }

  endorseDispute(call: CallContext, marketId: string, index: number): Dispute {
    requireNoValue(call);
    const roundState = requireRound(this.ctx.state, marketId);
    const dispute = requireDispute(roundState, index);
    if (!roundState.roster.has(call.sender)) {
      throw new ValidationError("Sender is not in the legislator roster for this round", "UNAUTHORIZED");
    }
    ensure(dispute.status === "ACTIVE", `Dispute ${index} is not active`);
    this.requireDisputeWindow(roundState, this.ctx.clock.now());
    const key = disputeStakeKey(index, call.sender);
    ensure(!roundState.endorsements.has(key), "Legislator already endorsed this dispute");

    roundState.endorsements.add(key);
    dispute.endorsementCount += 1;

    this.ctx.emit({
      type: "DisputeEndorsed",
      marketId,
      round: roundState.resolution.round,
      index,
      legislator: call.sender,
    });
    return { ...dispute };
  }

  getRequiredDisputeBond(marketId: string): bigint {
    const { resolution } = requireRound(this.ctx.state, marketId);
    return requiredDisputeBond(resolution.supportStake, this.ctx.clock.now() - resolution.proposedAt);
  }

  previewDisputeOutcome(marketId: string, round?: number): DisputeOutcomePreview {
    return scoreRound(requireRound(this.ctx.state, marketId, round));
  }

  getDisputes(marketId: string, round?: number): Dispute[] {
    return requireRound(this.ctx.state, marketId, round).disputes.map((d) => ({ ...d }));
  }

  getDisputeStake(marketId: string, index: number, supporter: string, round?: number): Stake | null {
    const roundState = requireRound(this.ctx.state, marketId, round);
    const stake = roundState.disputeStakes.get(disputeStakeKey(index, requireAddress(supporter, "supporter")));
    return stake === undefined ? null : { ...stake };
  }

  private requireDisputeWindow(roundState: RoundState, now: number): void {
    requireWindow(now < roundState.resolution.proposedAt + DISPUTE_PERIOD, "Dispute window has closed");
  }
}
