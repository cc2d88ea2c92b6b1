/**
 * Time-dependent terms: early-participation bonuses and the dispute bond.
 *
 * Bonus curve (seconds since the reference time t):
 *   t < 0                 -> 0
 *   0 <= t <= fullUntil   -> max
 *   fullUntil < t < zeroAt -> max * (zeroAt - t) / (zeroAt - fullUntil)
 *   t >= zeroAt           -> 0
 */

import {
  BPS,
  DISPUTE_PERIOD,
  EARLY_PROPOSAL_WINDOW,
  EARLY_STAKE_WINDOW,
  MAX_DISPUTE_BOND,
  MAX_PROPOSER_BONUS_BPS,
  MAX_STAKER_BONUS_BPS,
  MIN_DISPUTE_BOND,
  PROPOSER_BONUS_DECAY_PERIOD,
  SUPPORT_PERIOD,
} from "./constants.js";

export function linearDecayBonus(elapsed: number, fullUntil: number, zeroAt: number, maxBps: bigint): bigint {
  if (elapsed < 0 || elapsed >= zeroAt) return 0n;
  if (elapsed <= fullUntil) return maxBps;
  return (maxBps * BigInt(zeroAt - elapsed)) / BigInt(zeroAt - fullUntil);
}

/** Bonus for support staked at `at` on a resolution proposed at `proposedAt`. */
export function stakerTimingBonus(proposedAt: number, at: number): bigint {
  return linearDecayBonus(at - proposedAt, EARLY_STAKE_WINDOW, SUPPORT_PERIOD, MAX_STAKER_BONUS_BPS);
}

/** Bonus for proposing soon after the market stopped trading. */
export function proposerTimingBonus(tradingEnd: number, proposedAt: number): bigint {
  return linearDecayBonus(
    proposedAt - tradingEnd,
    EARLY_PROPOSAL_WINDOW,
    PROPOSER_BONUS_DECAY_PERIOD,
    MAX_PROPOSER_BONUS_BPS
  );
}

/** Apply a bonus to an amount: amount * (BPS + bonus) / BPS. */
export function weightByBonus(amount: bigint, bonusBps: bigint): bigint {
  return (amount * (BPS + bonusBps)) / BPS;
}

/**
 * Minimum bond to dispute: twice the support stake, scaled from 100% to 200% as the
 * dispute window elapses, clamped to [MIN_DISPUTE_BOND, MAX_DISPUTE_BOND].
 */
export function requiredDisputeBond(supportStake: bigint, elapsed: number): bigint {
  const clampedElapsed = Math.min(Math.max(elapsed, 0), DISPUTE_PERIOD);
  const base = supportStake * 2n;
  const multiplierBps = BPS + (BPS * BigInt(clampedElapsed)) / BigInt(DISPUTE_PERIOD);
  let bond = (base * multiplierBps) / BPS;
  if (bond > MAX_DISPUTE_BOND) bond = MAX_DISPUTE_BOND;
  if (bond < MIN_DISPUTE_BOND) bond = MIN_DISPUTE_BOND;
  return bond;
}
