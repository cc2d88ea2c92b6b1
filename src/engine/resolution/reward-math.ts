/**
 * Reward terms fixed at finalization.
 *
 * Winners always get their principal back. The losing side's stake is "forfeited";
 * the protocol fee (2.5% of support + opposition, never more than what was forfeited)
 * comes out of it and the rest ("surplus") is shared among winners pro-rata.
 * Rates are scaled by RATE_PRECISION and rounded down, so payouts never exceed funds.
 */

import {
  BPS,
  CHALLENGER_BONUS_BPS,
  CHALLENGER_BONUS_CAP_BPS,
  PROTOCOL_FEE_BPS,
  RATE_PRECISION,
} from "./constants.js";

function min(...values: bigint[]): bigint {
  return values.reduce((a, b) => (a < b ? a : b));
}

export function rateFor(surplus: bigint, base: bigint): bigint {
  return base > 0n ? (surplus * RATE_PRECISION) / base : 0n;
}

/** Reward on top of principal for `units` at `rate`. */
export function rewardFor(units: bigint, rate: bigint): bigint {
  return (units * rate) / RATE_PRECISION;
}

export function protocolFee(supportStake: bigint, oppositionStake: bigint, forfeited: bigint): bigint {
  return min(((supportStake + oppositionStake) * PROTOCOL_FEE_BPS) / BPS, forfeited);
}

export interface ApprovedInput {
  supportStake: bigint;
  weightedSupportStake: bigint;
  oppositionStake: bigint;
  rejectedDisputeStake: bigint;
}

export interface ApprovedTerms {
  forfeited: bigint;
  fee: bigint;
  surplus: bigint;
  supportRewardRate: bigint;
}

export function approvedTerms(input: ApprovedInput): ApprovedTerms {
  const forfeited = input.oppositionStake + input.rejectedDisputeStake;
  const fee = protocolFee(input.supportStake, input.oppositionStake, forfeited);
  const surplus = forfeited - fee;
  return { forfeited, fee, surplus, supportRewardRate: rateFor(surplus, input.weightedSupportStake) };
}

export interface RejectedInput {
  supportStake: bigint;
  oppositionStake: bigint;
  evidencePenaltyPaid: bigint;
}

export interface RejectedTerms {
  forfeited: bigint;
  fee: bigint;
  surplus: bigint;
  oppositionRewardRate: bigint;
  /** Surplus with no opposition staker to receive it. */
  slashedToTreasury: bigint;
}

export function rejectedTerms(input: RejectedInput): RejectedTerms {
  const forfeited = input.supportStake - input.evidencePenaltyPaid;
  const fee = protocolFee(input.supportStake, input.oppositionStake, forfeited);
  const surplus = forfeited - fee;
  if (input.oppositionStake === 0n) {
    return { forfeited, fee, surplus, oppositionRewardRate: 0n, slashedToTreasury: surplus };
  }
  return {
    forfeited,
    fee,
    surplus,
    oppositionRewardRate: rateFor(surplus, input.oppositionStake),
    slashedToTreasury: 0n,
  };
}

export interface UpheldDisputeInput extends RejectedInput {
  /** Combined stake of every other dispute on the round, all rejected. */
  otherDisputeStake: bigint;
  disputeBond: bigint;
  disputeSupportStake: bigint;
}

export interface UpheldDisputeTerms {
  forfeited: bigint;
  fee: bigint;
  surplus: bigint;
  oppositionRewardRate: bigint;
  challengerBonus: bigint;
  disputeSupporterRewardRate: bigint;
}

/**
 * Surplus is split between opposition stakers and the winning dispute in proportion to
 * opposition stake and the dispute's combined pool. The challenger's bonus is 30% of the
 * pool (ceiling 50%), limited to the dispute's share; the rest goes to its supporters.
 */
export function upheldDisputeTerms(input: UpheldDisputeInput): UpheldDisputeTerms {
  const forfeited = input.supportStake - input.evidencePenaltyPaid + input.otherDisputeStake;
  const fee = protocolFee(input.supportStake, input.oppositionStake, forfeited);
  const surplus = forfeited - fee;

  const disputePool = input.disputeBond + input.disputeSupportStake;
  const oppositionShare = (surplus * input.oppositionStake) / (input.oppositionStake + disputePool);
  const disputeShare = surplus - oppositionShare;

  let challengerBonus = min(
    (disputePool * CHALLENGER_BONUS_BPS) / BPS,
    (disputePool * CHALLENGER_BONUS_CAP_BPS) / BPS,
    disputeShare
  );
  const remainder = disputeShare - challengerBonus;
  let disputeSupporterRewardRate = 0n;
  if (input.disputeSupportStake > 0n) {
    disputeSupporterRewardRate = rateFor(remainder, input.disputeSupportStake);
  } else {
    challengerBonus += remainder;
  }

  return {
    forfeited,
    fee,
    surplus,
    oppositionRewardRate: rateFor(oppositionShare, input.oppositionStake),
    challengerBonus,
    disputeSupporterRewardRate,
  };
}
