/**
 * Sybil-resistant scoring of a resolution against its disputes.
 *
 *   score = isqrt(stake / 1 token) * min(backers, 10) * 6000
 *         + votes * LEGISLATOR_VOTE_WEIGHT * 4000
 *
 * Scores stay in basis-point scale so they are exact integers. The square root blunts
 * whale stake; the backer cap blunts fan-out across many identities.
 */

import { Decimal } from "decimal.js";
import {
  LEGISLATOR_VOTE_WEIGHT,
  MAX_BACKER_MULTIPLIER,
  ONE_TOKEN,
  STAKE_SCORE_WEIGHT_BPS,
  VOTE_SCORE_WEIGHT_BPS,
} from "./constants.js";
import type { DisputeScore } from "../../types/resolution.js";

const IntDecimal = Decimal.clone({ precision: 100, rounding: Decimal.ROUND_DOWN });

export interface ScoreInput {
  stake: bigint;
  backers: number;
  votes: number;
}

export function integerSqrt(value: bigint): bigint {
  if (value < 0n) throw new Error("integerSqrt: negative input");
  if (value < 2n) return value;
  let root = BigInt(new IntDecimal(value.toString()).sqrt().floor().toFixed(0));
  // Exact floor root.
  while (root * root > value) root -= 1n;
  while ((root + 1n) * (root + 1n) <= value) root += 1n;
  return root;
}

export function computeScore({ stake, backers, votes }: ScoreInput): bigint {
  const wholeUnits = stake / ONE_TOKEN;
  const backerCount = BigInt(Math.max(backers, 0));
  const backerFactor = backerCount < MAX_BACKER_MULTIPLIER ? backerCount : MAX_BACKER_MULTIPLIER;
  const stakeComponent = integerSqrt(wholeUnits) * backerFactor;
  const voteComponent = BigInt(Math.max(votes, 0)) * LEGISLATOR_VOTE_WEIGHT;
  return stakeComponent * STAKE_SCORE_WEIGHT_BPS + voteComponent * VOTE_SCORE_WEIGHT_BPS;
}

/**
 * Winner among disputes: strictly highest score that also strictly exceeds the
 * resolution's score. Scores are scanned in index order with a strict comparison,
 * so among equal top scores the earliest dispute wins.
 */
export function selectWinningDispute(resolutionScore: bigint, disputeScores: DisputeScore[]): number | null {
  let best: DisputeScore | null = null;
  for (const entry of disputeScores) {
    if (best === null || entry.score > best.score) best = entry;
  }
  if (best === null || best.score <= resolutionScore) return null;
  return best.index;
}
