/**
 * Fixed protocol parameters. Durations are in seconds, percentages in basis points.
 * None of these are configurable per call or per deployment.
 */

import { parseEther } from "viem";

export const BPS = 10_000n;
/** Fixed-point scale for reward rates. */
export const RATE_PRECISION = 10n ** 18n;
/** One whole native token in wei; dispute scoring works in whole units. */
export const ONE_TOKEN = 10n ** 18n;

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

// Commit-reveal proposal
export const MIN_COMMIT_BOND = parseEther("0.1");
export const MIN_PROPOSAL_STAKE = parseEther("1");
export const COMMIT_COOLDOWN = HOUR;
export const MIN_REVEAL_DELAY = 5 * MINUTE;
export const MAX_REVEAL_DELAY = DAY;
export const UNREVEALED_SLASH_BOUNTY_BPS = 1_000n;
export const MAX_EVIDENCE_URI_LENGTH = 512;

// Early-proposer bonus, measured from the market's trading end
export const EARLY_PROPOSAL_WINDOW = HOUR;
export const PROPOSER_BONUS_DECAY_PERIOD = DAY;
export const MAX_PROPOSER_BONUS_BPS = 500n;

// Support / opposition staking
export const MIN_STAKE = parseEther("0.01");
export const SUPPORT_PERIOD = DAY;
export const EARLY_STAKE_WINDOW = HOUR;
export const MAX_STAKER_BONUS_BPS = 1_000n;
export const AUTO_APPROVAL_THRESHOLD_BPS = 7_500n;

// Evidence challenges
export const EVIDENCE_CHALLENGE_PERIOD = 6 * HOUR;
export const MIN_EVIDENCE_CHALLENGE_STAKE = parseEther("0.5");
export const MAX_EVIDENCE_CHALLENGES = 10;
export const MAX_CHALLENGE_REASON_LENGTH = 1_000;

// Legislator voting; the commit window opens when the support window closes
export const LEGISLATOR_COMMIT_PERIOD = DAY;
export const LEGISLATOR_REVEAL_PERIOD = DAY;
export const LEGISLATOR_SLASH_BPS = 500n;
export const OVERRIDE_THRESHOLD_BPS = 6_666n;

// Disputes
export const DISPUTE_PERIOD = 4 * DAY;
export const FINALIZATION_BUFFER = HOUR;
export const MIN_DISPUTE_BOND = parseEther("1");
export const MAX_DISPUTE_BOND = parseEther("100");
export const MAX_DISPUTES = 20;

// Scoring
export const STAKE_SCORE_WEIGHT_BPS = 6_000n;
export const VOTE_SCORE_WEIGHT_BPS = 4_000n;
export const LEGISLATOR_VOTE_WEIGHT = 100n;
export const MAX_BACKER_MULTIPLIER = 10n;

// Rewards
export const PROTOCOL_FEE_BPS = 250n;
export const CHALLENGER_BONUS_BPS = 3_000n;
export const CHALLENGER_BONUS_CAP_BPS = 5_000n;

/** End of the legislator commit window relative to proposal time. */
export const LEGISLATOR_COMMIT_END = SUPPORT_PERIOD + LEGISLATOR_COMMIT_PERIOD;
/** End of the legislator reveal window relative to proposal time. */
export const LEGISLATOR_REVEAL_END = LEGISLATOR_COMMIT_END + LEGISLATOR_REVEAL_PERIOD;
