/**
 * Stake-backed objections to a proposal's evidence, adjudicated by a legislator from the
 * round's roster snapshot or by an oracle manager. At most MAX_EVIDENCE_CHALLENGES per round.
 */

import {
  EVIDENCE_CHALLENGE_PERIOD,
  MAX_CHALLENGE_REASON_LENGTH,
  MAX_EVIDENCE_CHALLENGES,
  MIN_EVIDENCE_CHALLENGE_STAKE,
} from "./constants.js";
import { requireMinimumValue, requireNoValue, requireWindow, type ProtocolContext } from "./context.js";
import { SolvencyError, ValidationError, ensure } from "./errors.js";
import { requireRound, type RoundState } from "./protocol-state.js";
import type { CallContext, EvidenceChallenge } from "../../types/resolution.js";

export function hasUnresolvedChallenges(roundState: RoundState): boolean {
  return roundState.evidenceChallenges.some((c) => !c.resolved);
}

export class EvidenceChallenges {
  constructor(private readonly ctx: ProtocolContext) {}

  challengeEvidence(call: CallContext, marketId: string, reason: string): EvidenceChallenge {
    const roundState = requireRound(this.ctx.state, marketId);
    const resolution = roundState.resolution;
    const now = this.ctx.clock.now();
    ensure(!resolution.finalized && resolution.status !== "REJECTED", "Resolution is not open to challenges");
    requireWindow(now < resolution.proposedAt + EVIDENCE_CHALLENGE_PERIOD, "Evidence challenge window has closed");
    ensure(reason.trim().length > 0, "Challenge reason is required");
    ensure(
      reason.length <= MAX_CHALLENGE_REASON_LENGTH,
      `Challenge reason exceeds ${MAX_CHALLENGE_REASON_LENGTH} characters`
    );
    ensure(
      roundState.evidenceChallenges.length < MAX_EVIDENCE_CHALLENGES,
      `At most ${MAX_EVIDENCE_CHALLENGES} evidence challenges per resolution`
    );
    const stake = requireMinimumValue(call, MIN_EVIDENCE_CHALLENGE_STAKE, "Challenge stake");

    this.ctx.ledger.receive(marketId, call.sender, stake);
    const challenge: EvidenceChallenge = {
      index: roundState.evidenceChallenges.length,
      challenger: call.sender,
      reason,
      stake,
      createdAt: now,
      resolved: false,
      upheld: false,
    };
    roundState.evidenceChallenges.push(challenge);

    this.ctx.emit({
      type: "EvidenceChallenged",
      marketId,
      round: resolution.round,
      index: challenge.index,
      challenger: call.sender,
      stake,
    });
    return { ...challenge };
  }

  /**
   * Upheld: the round is rejected, the market goes back to settlement and the challenger
   * receives twice the stake (the extra half out of forfeitable support). Otherwise refund.
   */
  resolveEvidenceChallenge(
    call: CallContext,
    marketId: string,
    index: number,
    upheld: boolean,
    round?: number
  ): bigint {
    requireNoValue(call);
    const roundState = requireRound(this.ctx.state, marketId, round);
    const resolution = roundState.resolution;
    if (!roundState.roster.has(call.sender) && !this.ctx.oracleManagers.has(call.sender)) {
      throw new ValidationError("Only a legislator or oracle manager can resolve challenges", "UNAUTHORIZED");
    }
    const challenge = roundState.evidenceChallenges[index];
    if (challenge === undefined) throw new ValidationError(`Evidence challenge ${index} not found`, "NOT_FOUND");
    ensure(!challenge.resolved, "Evidence challenge already resolved");

    challenge.resolved = true;
    challenge.upheld = upheld;
    let payout = challenge.stake;
    if (upheld) {
      if (resolution.evidencePenaltyPaid + challenge.stake > resolution.supportStake) {
        throw new SolvencyError("Forfeitable support cannot cover the challenger reward");
      }
      resolution.evidencePenaltyPaid += challenge.stake;
      payout = challenge.stake * 2n;
      if (resolution.status !== "REJECTED") {
        resolution.status = "REJECTED";
        resolution.rejectedByEvidence = true;
        this.ctx.notifier.returnToSettlement(marketId);
        this.ctx.emit({
          type: "ResolutionStatusChanged",
          marketId,
          round: resolution.round,
          status: "REJECTED",
          reason: "evidence-upheld",
        });
      }
    }
    this.ctx.ledger.release(marketId, challenge.challenger, payout);

    this.ctx.emit({
      type: "EvidenceChallengeResolved",
      marketId,
      round: resolution.round,
      index,
      upheld,
      payout,
    });
    return payout;
  }

  list(marketId: string, round?: number): EvidenceChallenge[] {
    return requireRound(this.ctx.state, marketId, round).evidenceChallenges.map((c) => ({ ...c }));
  }
}
