/**
 * Support / opposition stake on the latest resolution round.
 * Support is weighted by a timing bonus that decays over the support window.
 */

import { AUTO_APPROVAL_THRESHOLD_BPS, BPS, MIN_STAKE, SUPPORT_PERIOD } from "./constants.js";
import { requireAddress } from "./commitments.js";
import { requireMinimumValue, requireWindow, type ProtocolContext } from "./context.js";
import { ensure } from "./errors.js";
import { requireRound, type RoundState } from "./protocol-state.js";
import { stakerTimingBonus, weightByBonus } from "./timing-bonus.js";
import type { CallContext, Stake } from "../../types/resolution.js";

export type StakeSide = "support" | "opposition";

export class StakingLedger {
  constructor(private readonly ctx: ProtocolContext) {}

  supportResolution(call: CallContext, marketId: string): Stake {
    const roundState = requireRound(this.ctx.state, marketId);
    const stake = this.placeStake(call, roundState, "support");
    this.checkAutoApproval(roundState);
    return stake;
  }

  opposeResolution(call: CallContext, marketId: string): Stake {
    return this.placeStake(call, requireRound(this.ctx.state, marketId), "opposition");
  }

  getStake(marketId: string, account: string, side: StakeSide, round?: number): Stake | null {
    const roundState = requireRound(this.ctx.state, marketId, round);
    const stakes = side === "support" ? roundState.supportStakes : roundState.oppositionStakes;
    const stake = stakes.get(requireAddress(account));
    return stake === undefined ? null : { ...stake };
  }

  /** Support bonus (bps) a stake placed at `at` would receive on the latest round. */
  getTimingBonus(marketId: string, at: number): bigint {
    const { resolution } = requireRound(this.ctx.state, marketId);
    return stakerTimingBonus(resolution.proposedAt, at);
  }

  private placeStake(call: CallContext, roundState: RoundState, side: StakeSide): Stake {
    const { ledger, clock } = this.ctx;
    const resolution = roundState.resolution;
    const now = clock.now();
    ensure(!resolution.finalized && resolution.status !== "REJECTED", "Resolution is not accepting stake");
    requireWindow(now < resolution.proposedAt + SUPPORT_PERIOD, "Support window has closed");
    const amount = requireMinimumValue(call, MIN_STAKE, "Stake");

    const [stakes, otherSide] =
      side === "support"
        ? [roundState.supportStakes, roundState.oppositionStakes]
        : [roundState.oppositionStakes, roundState.supportStakes];
    ensure(!otherSide.has(call.sender), "Cannot stake on both sides of a resolution");
    const existing = stakes.get(call.sender);
    ensure(existing === undefined || !existing.withdrawn, "Stake was already withdrawn");

    ledger.receive(resolution.marketId, call.sender, amount);

    const timingBonusBps = side === "support" ? stakerTimingBonus(resolution.proposedAt, now) : 0n;
    const weighted = weightByBonus(amount, timingBonusBps);
    let stake: Stake;
    if (existing === undefined) {
      stake = { amount, weightedAmount: weighted, timingBonusBps, lastContributionAt: now, withdrawn: false };
      stakes.set(call.sender, stake);
      if (side === "support") resolution.supportCount += 1;
      else resolution.oppositionCount += 1;
    } else {
      stake = existing;
      stake.amount += amount;
      stake.weightedAmount += weighted;
      stake.timingBonusBps = timingBonusBps;
      stake.lastContributionAt = now;
    }

    if (side === "support") {
      resolution.supportStake += amount;
      resolution.weightedSupportStake += weighted;
    } else {
      resolution.oppositionStake += amount;
    }

    this.ctx.emit({
      type: "StakePlaced",
      marketId: resolution.marketId,
      round: resolution.round,
      staker: call.sender,
      side,
      amount,
      timingBonusBps,
    });
    return { ...stake };
  }

  /** Advisory promotion to APPROVED at 75% support; finality only comes from finalization. */
  private checkAutoApproval(roundState: RoundState): void {
    const resolution = roundState.resolution;
    if (resolution.status !== "PENDING") return;
    const total = resolution.supportStake + resolution.oppositionStake;
    if (resolution.supportStake * BPS >= AUTO_APPROVAL_THRESHOLD_BPS * total) {
      resolution.status = "APPROVED";
      this.ctx.emit({
        type: "ResolutionStatusChanged",
        marketId: resolution.marketId,
        round: resolution.round,
        status: "APPROVED",
        reason: "auto-approval",
      });
    }
  }
}
