/**
 * Finalization fixes the outcome of a round and its reward terms; claims pay from those
 * terms. Every claim marks its stake withdrawn before the transfer, so a second claim fails.
 */

import { DISPUTE_PERIOD, FINALIZATION_BUFFER } from "./constants.js";
import { requireAddress } from "./commitments.js";
import { requireNoValue, requireWindow, type ProtocolContext } from "./context.js";
import { scoreRound } from "./dispute-engine.js";
import { ValidationError, ensure } from "./errors.js";
import { hasUnresolvedChallenges } from "./evidence-challenges.js";
import { disputeStakeKey, requireDispute, requireRound, type RoundState } from "./protocol-state.js";
import { approvedTerms, rejectedTerms, rewardFor, upheldDisputeTerms } from "./reward-math.js";
import type { CallContext, Dispute, Resolution, RewardSettlement, Stake } from "../../types/resolution.js";

export interface FinalizableRound {
  marketId: string;
  round: number;
}

function disputeTotal(disputes: Dispute[]): bigint {
  return disputes.reduce((sum, d) => sum + d.bond + d.supportStake, 0n);
}

function requireSettlement(resolution: Resolution): RewardSettlement {
  if (!resolution.finalized || resolution.settlement === null) {
    throw new ValidationError("Resolution is not finalized");
  }
  return resolution.settlement;
}

/** Lazy finalization waits an extra buffer and never takes the evidence-rejection shortcut. */
function canFinalize(roundState: RoundState, now: number, lazy: boolean): boolean {
  const resolution = roundState.resolution;
  if (resolution.finalized || hasUnresolvedChallenges(roundState)) return false;
  if (!lazy && resolution.rejectedByEvidence) return true;
  return now >= resolution.proposedAt + DISPUTE_PERIOD + (lazy ? FINALIZATION_BUFFER : 0);
}

export class Finalization {
  constructor(private readonly ctx: ProtocolContext) {}

  finalizeResolution(call: CallContext, marketId: string, round?: number): Resolution {
    requireNoValue(call);
    const roundState = requireRound(this.ctx.state, marketId, round);
    const resolution = roundState.resolution;
    ensure(!resolution.finalized, "Resolution is already finalized");
    ensure(!hasUnresolvedChallenges(roundState), "Evidence challenges are still unresolved");
    requireWindow(
      resolution.rejectedByEvidence || this.ctx.clock.now() >= resolution.proposedAt + DISPUTE_PERIOD,
      "Dispute window is still open"
    );
    this.settle(roundState);
    return { ...resolution };
  }

  /** Finalize lazily once the dispute window and buffer have passed. */
  tryAutoFinalize(roundState: RoundState): boolean {
    if (!canFinalize(roundState, this.ctx.clock.now(), true)) return false;
    this.settle(roundState);
    return true;
  }

  claimResolutionReward(call: CallContext, marketId: string, round?: number): bigint {
    requireNoValue(call);
    const roundState = this.claimableRound(marketId, round);
    const resolution = roundState.resolution;
    const settlement = requireSettlement(resolution);
    ensure(resolution.status === "APPROVED", "Supporters of a rejected resolution have nothing to claim");
    const stake = this.requireUnclaimed(roundState.supportStakes.get(call.sender), "support");

    const amount = stake.amount + rewardFor(stake.weightedAmount, settlement.supportRewardRate);
    stake.withdrawn = true;
    this.ctx.ledger.release(marketId, call.sender, amount);
    this.emitClaim(resolution, call, "support", amount);
    return amount;
  }

  claimOppositionReward(call: CallContext, marketId: string, round?: number): bigint {
    requireNoValue(call);
    const roundState = this.claimableRound(marketId, round);
    const resolution = roundState.resolution;
    const settlement = requireSettlement(resolution);
    ensure(resolution.status === "REJECTED", "Opposition to an approved resolution has nothing to claim");
    const stake = this.requireUnclaimed(roundState.oppositionStakes.get(call.sender), "opposition");

    const amount = stake.amount + rewardFor(stake.amount, settlement.oppositionRewardRate);
    stake.withdrawn = true;
    this.ctx.ledger.release(marketId, call.sender, amount);
    this.emitClaim(resolution, call, "opposition", amount);
    return amount;
  }

  /** Challenger bond plus bonus, and/or supporter principal plus reward, of an upheld dispute. */
  claimDisputeReward(call: CallContext, marketId: string, index: number, round?: number): bigint {
    requireNoValue(call);
    const roundState = this.claimableRound(marketId, round);
    requireSettlement(roundState.resolution);
    const dispute = requireDispute(roundState, index);
    ensure(dispute.status === "UPHELD", `Dispute ${index} was not upheld`);

    let amount = 0n;
    if (dispute.challenger === call.sender && !dispute.challengerWithdrawn) {
      dispute.challengerWithdrawn = true;
      amount += dispute.bond + dispute.challengerBonus;
    }
    const stake = roundState.disputeStakes.get(disputeStakeKey(index, call.sender));
    if (stake !== undefined && !stake.withdrawn) {
      stake.withdrawn = true;
      amount += stake.amount + rewardFor(stake.amount, dispute.supporterRewardRate);
    }
    ensure(amount > 0n, "Nothing to claim for this dispute");

    this.ctx.ledger.release(marketId, call.sender, amount);
    this.emitClaim(roundState.resolution, call, "dispute", amount);
    return amount;
  }

  /** Principal back from a dispute voided by the resolution's rejection. */
  reclaimDisputeStake(call: CallContext, marketId: string, index: number, round?: number): bigint {
    requireNoValue(call);
    const roundState = this.claimableRound(marketId, round);
    requireSettlement(roundState.resolution);
    const dispute = requireDispute(roundState, index);
    ensure(dispute.status === "VOIDED", `Dispute ${index} was not voided`);

    let amount = 0n;
    if (dispute.challenger === call.sender && !dispute.challengerWithdrawn) {
      dispute.challengerWithdrawn = true;
      amount += dispute.bond;
    }
    const stake = roundState.disputeStakes.get(disputeStakeKey(index, call.sender));
    if (stake !== undefined && !stake.withdrawn) {
      stake.withdrawn = true;
      amount += stake.amount;
    }
    ensure(amount > 0n, "Nothing to reclaim for this dispute");

    this.ctx.ledger.release(marketId, call.sender, amount);
    this.emitClaim(roundState.resolution, call, "dispute-reclaim", amount);
    return amount;
  }

  withdrawProtocolFees(call: CallContext, to: string, amount: bigint): void {
    requireNoValue(call);
    if (!this.ctx.oracleManagers.has(call.sender)) {
      throw new ValidationError("Only an oracle manager can withdraw protocol fees", "UNAUTHORIZED");
    }
    const recipient = requireAddress(to, "recipient");
    this.ctx.ledger.withdrawFees(recipient, amount);
    this.ctx.emit({ type: "ProtocolFeesWithdrawn", to: recipient, amount });
  }

  /** Rounds that `finalizeResolution` would accept right now. */
  listFinalizable(): FinalizableRound[] {
    const now = this.ctx.clock.now();
    const found: FinalizableRound[] = [];
    for (const [marketId, rounds] of this.ctx.state.rounds) {
      for (const roundState of rounds) {
        if (canFinalize(roundState, now, false)) found.push({ marketId, round: roundState.resolution.round });
      }
    }
    return found;
  }

  private claimableRound(marketId: string, round?: number): RoundState {
    const roundState = requireRound(this.ctx.state, marketId, round);
    this.tryAutoFinalize(roundState);
    return roundState;
  }

  private requireUnclaimed(stake: Stake | undefined, side: string): Stake {
    if (stake === undefined) throw new ValidationError(`No ${side} stake for this account`, "NOT_FOUND");
    ensure(!stake.withdrawn, "Reward already claimed");
    return stake;
  }

  private emitClaim(
    resolution: Resolution,
    call: CallContext,
    kind: "support" | "opposition" | "dispute" | "dispute-reclaim",
    amount: bigint
  ): void {
    this.ctx.emit({
      type: "RewardClaimed",
      marketId: resolution.marketId,
      round: resolution.round,
      claimant: call.sender,
      kind,
      amount,
    });
  }

  private settle(roundState: RoundState): void {
    const resolution = roundState.resolution;
    const winner = resolution.status === "REJECTED" ? null : scoreRound(roundState).winningDisputeIndex;

    if (winner !== null) {
      this.settleUpheldDispute(roundState, winner);
    } else {
      if (resolution.status === "PENDING") {
        resolution.status = resolution.supportStake > resolution.oppositionStake ? "APPROVED" : "REJECTED";
      }
      if (resolution.status === "APPROVED") this.settleApproved(roundState);
      else this.settleRejected(roundState);
    }

    resolution.finalized = true;
    resolution.finalizedAt = this.ctx.clock.now();
    const settlement = requireSettlement(resolution);
    this.ctx.emit({
      type: "ResolutionFinalized",
      marketId: resolution.marketId,
      round: resolution.round,
      status: resolution.status,
      finalOutcome: resolution.finalOutcome,
      upheldDisputeIndex: settlement.upheldDisputeIndex,
      protocolFee: settlement.protocolFee,
    });
  }

  private settleApproved(roundState: RoundState): void {
    const resolution = roundState.resolution;
    const losing = roundState.disputes.filter((d) => d.status === "ACTIVE");
    for (const dispute of losing) dispute.status = "REJECTED";

    const terms = approvedTerms({
      supportStake: resolution.supportStake,
      weightedSupportStake: resolution.weightedSupportStake,
      oppositionStake: resolution.oppositionStake,
      rejectedDisputeStake: disputeTotal(losing),
    });
    this.ctx.ledger.collectFee(resolution.marketId, terms.fee);
    resolution.finalOutcome = resolution.proposedOutcome;
    resolution.settlement = {
      supportRewardRate: terms.supportRewardRate,
      oppositionRewardRate: 0n,
      protocolFee: terms.fee,
      forfeited: terms.forfeited,
      slashedToTreasury: 0n,
      upheldDisputeIndex: null,
    };
    this.ctx.notifier.markFinalized(resolution.marketId, resolution.proposedOutcome);
  }

  private settleRejected(roundState: RoundState): void {
    const resolution = roundState.resolution;
    for (const dispute of roundState.disputes) {
      if (dispute.status === "ACTIVE") dispute.status = "VOIDED";
    }

    const terms = rejectedTerms({
      supportStake: resolution.supportStake,
      oppositionStake: resolution.oppositionStake,
      evidencePenaltyPaid: resolution.evidencePenaltyPaid,
    });
    this.ctx.ledger.collectFee(resolution.marketId, terms.fee);
    this.ctx.ledger.forfeit(resolution.marketId, terms.slashedToTreasury);
    // forfeit() already counted the treasury share
    this.ctx.state.metrics.totalSlashed += terms.forfeited - terms.slashedToTreasury;
    resolution.settlement = {
      supportRewardRate: 0n,
      oppositionRewardRate: terms.oppositionRewardRate,
      protocolFee: terms.fee,
      forfeited: terms.forfeited,
      slashedToTreasury: terms.slashedToTreasury,
      upheldDisputeIndex: null,
    };
    // An evidence rejection already handed the market back, possibly to a newer round.
    if (!resolution.rejectedByEvidence) this.ctx.notifier.returnToSettlement(resolution.marketId);
  }

  private settleUpheldDispute(roundState: RoundState, winner: number): void {
    const resolution = roundState.resolution;
    const upheld = requireDispute(roundState, winner);
    const losing = roundState.disputes.filter((d) => d.status === "ACTIVE" && d.index !== winner);
    upheld.status = "UPHELD";
    for (const dispute of losing) dispute.status = "REJECTED";
    resolution.status = "REJECTED";

    const terms = upheldDisputeTerms({
      supportStake: resolution.supportStake,
      oppositionStake: resolution.oppositionStake,
      evidencePenaltyPaid: resolution.evidencePenaltyPaid,
      otherDisputeStake: disputeTotal(losing),
      disputeBond: upheld.bond,
      disputeSupportStake: upheld.supportStake,
    });
    upheld.challengerBonus = terms.challengerBonus;
    upheld.supporterRewardRate = terms.disputeSupporterRewardRate;
    this.ctx.ledger.collectFee(resolution.marketId, terms.fee);
    this.ctx.state.metrics.totalSlashed += resolution.supportStake - resolution.evidencePenaltyPaid;
    resolution.settlement = {
      supportRewardRate: 0n,
      oppositionRewardRate: terms.oppositionRewardRate,
      protocolFee: terms.fee,
      forfeited: terms.forfeited,
      slashedToTreasury: 0n,
      upheldDisputeIndex: winner,
    };
    this.ctx.notifier.returnToSettlement(resolution.marketId);
  }
}
