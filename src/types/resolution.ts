/**
 * Resolution protocol records. Amounts are wei (bigint), times are unix seconds.
 * Records are plain data so the protocol state can be snapshotted and restored as a whole.
 */

import type { Address, Hex } from "viem";

export type ResolutionStatus = "PENDING" | "APPROVED" | "REJECTED";

export type DisputeStatus = "ACTIVE" | "UPHELD" | "REJECTED" | "VOIDED";

export interface EvidenceRef {
  uri: string;
  hash: Hex;
}

/** Identity and value of a single protocol call (sender pays `value` in through the funds gateway). */
export interface CallContext {
  sender: Address;
  value?: bigint;
}

export interface ResolutionCommit {
  marketId: string;
  committer: Address;
  commitHash: Hex;
  committedAt: number;
  bond: bigint;
  revealed: boolean;
  slashed: boolean;
}

/** Terms fixed at finalization; claims read these and nothing else. */
export interface RewardSettlement {
  /** Reward per bonus-weighted support unit, scaled by RATE_PRECISION. */
  supportRewardRate: bigint;
  /** Reward per opposition unit on top of principal, scaled by RATE_PRECISION. */
  oppositionRewardRate: bigint;
  protocolFee: bigint;
  forfeited: bigint;
  /** Forfeited surplus with no winner to receive it, moved to protocol fees. */
  slashedToTreasury: bigint;
  upheldDisputeIndex: number | null;
}

export interface Resolution {
  marketId: string;
  round: number;
  proposer: Address;
  proposedOutcome: number;
  proposedAt: number;
  evidence: EvidenceRef;
  supportStake: bigint;
  /** Support stake weighted by each contribution's timing bonus. */
  weightedSupportStake: bigint;
  oppositionStake: bigint;
  supportCount: number;
  oppositionCount: number;
  legislatorSupportVotes: number;
  legislatorOppositionVotes: number;
  status: ResolutionStatus;
  disputed: boolean;
  finalized: boolean;
  finalizedAt: number | null;
  finalOutcome: number | null;
  proposerBonusBps: bigint;
  rejectedByEvidence: boolean;
  /** Extra paid to upheld evidence challengers out of forfeitable support. */
  evidencePenaltyPaid: bigint;
  settlement: RewardSettlement | null;
}

export interface Stake {
  amount: bigint;
  /** Bonus-weighted amount; equals `amount` for opposition and dispute stakes. */
  weightedAmount: bigint;
  timingBonusBps: bigint;
  lastContributionAt: number;
  withdrawn: boolean;
}

export interface Dispute {
  index: number;
  challenger: Address;
  alternativeOutcome: number;
  bond: bigint;
  supportStake: bigint;
  supporterCount: number;
  endorsementCount: number;
  status: DisputeStatus;
  evidence: EvidenceRef;
  createdAt: number;
  challengerWithdrawn: boolean;
  challengerBonus: bigint;
  supporterRewardRate: bigint;
}

export interface LegislatorVoteCommit {
  legislator: Address;
  commitHash: Hex;
  committedAt: number;
  revealed: boolean;
  support: boolean | null;
  slashed: boolean;
}

export interface EvidenceChallenge {
  index: number;
  challenger: Address;
  reason: string;
  stake: bigint;
  createdAt: number;
  resolved: boolean;
  upheld: boolean;
}

export interface RosterEntry {
  legislator: Address;
  votingWeight: bigint;
}

export interface TreasuryState {
  /** Funds actually held in custody. */
  custodied: bigint;
  /** Funds owed to participants of live or unclaimed resolutions. */
  earmarked: bigint;
  earmarkedByMarket: Map<string, bigint>;
  protocolFees: bigint;
}

export interface ProtocolMetrics {
  resolutionsProposed: number;
  disputesFiled: number;
  commitsSlashed: number;
  legislatorsSlashed: number;
  totalFeesCollected: bigint;
  totalSlashed: bigint;
  totalPaidOut: bigint;
}

export interface DisputeScore {
  index: number;
  score: bigint;
}

export interface DisputeOutcomePreview {
  resolutionScore: bigint;
  disputeScores: DisputeScore[];
  winningDisputeIndex: number | null;
}

type EventBase<T extends string> = { type: T; at: number };

export type ProtocolEvent =
  | (EventBase<"ResolutionCommitted"> & { marketId: string; committer: Address; bond: bigint })
  | (EventBase<"ResolutionProposed"> & {
      marketId: string;
      round: number;
      proposer: Address;
      outcome: number;
      stake: bigint;
      proposerBonusBps: bigint;
      rosterSize: number;
    })
  | (EventBase<"UnrevealedCommitSlashed"> & { marketId: string; committer: Address; slasher: Address; bounty: bigint })
  | (EventBase<"StakePlaced"> & {
      marketId: string;
      round: number;
      staker: Address;
      side: "support" | "opposition";
      amount: bigint;
      timingBonusBps: bigint;
    })
  | (EventBase<"ResolutionStatusChanged"> & {
      marketId: string;
      round: number;
      status: ResolutionStatus;
      reason: "auto-approval" | "legislator-override" | "evidence-upheld";
    })
  | (EventBase<"EvidenceChallenged"> & { marketId: string; round: number; index: number; challenger: Address; stake: bigint })
  | (EventBase<"EvidenceChallengeResolved"> & {
      marketId: string;
      round: number;
      index: number;
      upheld: boolean;
      payout: bigint;
    })
  | (EventBase<"LegislatorVoteCommitted"> & { marketId: string; round: number; legislator: Address })
  | (EventBase<"LegislatorVoteRevealed"> & { marketId: string; round: number; legislator: Address; support: boolean })
  | (EventBase<"LegislatorSlashed"> & { marketId: string; round: number; legislator: Address; penalty: bigint | null })
  | (EventBase<"DisputeFiled"> & {
      marketId: string;
      round: number;
      index: number;
      challenger: Address;
      alternativeOutcome: number;
      bond: bigint;
    })
  | (EventBase<"DisputeSupported"> & { marketId: string; round: number; index: number; supporter: Address; amount: bigint })
  | (EventBase<"DisputeEndorsed"> & { marketId: string; round: number; index: number; legislator: Address })
  | (EventBase<"ResolutionFinalized"> & {
      marketId: string;
      round: number;
      status: ResolutionStatus;
      finalOutcome: number | null;
      upheldDisputeIndex: number | null;
      protocolFee: bigint;
    })
  | (EventBase<"RewardClaimed"> & {
      marketId: string;
      round: number;
      claimant: Address;
      kind: "support" | "opposition" | "dispute" | "dispute-reclaim";
      amount: bigint;
    })
  | (EventBase<"ProtocolFeesWithdrawn"> & { to: Address; amount: bigint })
  | (EventBase<"ExternalCallFailed"> & { target: string; action: string; marketId: string | null; error: string });

export type ProtocolEventType = ProtocolEvent["type"];
