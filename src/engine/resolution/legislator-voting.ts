/**
 * Commit-reveal voting by the legislators frozen into a round at proposal time.
 *
 * Timeline, relative to proposedAt:
 *   [SUPPORT_PERIOD, LEGISLATOR_COMMIT_END)   commit
 *   [LEGISLATOR_COMMIT_END, LEGISLATOR_REVEAL_END)   reveal, override check after each reveal
 *   >= LEGISLATOR_REVEAL_END   unrevealed commits can be slashed by anyone
 */

import type { Address } from "viem";
import {
  BPS,
  LEGISLATOR_COMMIT_END,
  LEGISLATOR_REVEAL_END,
  LEGISLATOR_SLASH_BPS,
  OVERRIDE_THRESHOLD_BPS,
  SUPPORT_PERIOD,
} from "./constants.js";
import { legislatorVoteCommitment, requireAddress, requireBytes32, requireNonZeroBytes32 } from "./commitments.js";
import { requireNoValue, requireWindow, type ProtocolContext } from "./context.js";
import { ValidationError, ensure } from "./errors.js";
import { hasActiveDispute, requireRound, type RoundState } from "./protocol-state.js";
import type { CallContext, LegislatorVoteCommit, ResolutionStatus, RosterEntry } from "../../types/resolution.js";

export class LegislatorVoting {
  constructor(private readonly ctx: ProtocolContext) {}

  commitLegislatorVote(call: CallContext, marketId: string, commitHash: string): LegislatorVoteCommit {
    requireNoValue(call);
    const roundState = requireRound(this.ctx.state, marketId);
    const resolution = roundState.resolution;
    const hash = requireNonZeroBytes32(commitHash, "Commit hash");
    this.requireRosterMember(roundState, call.sender);
    ensure(!resolution.finalized, "Resolution is already finalized");

    const now = this.ctx.clock.now();
    requireWindow(now >= resolution.proposedAt + SUPPORT_PERIOD, "Legislator commit window has not opened");
    requireWindow(now < resolution.proposedAt + LEGISLATOR_COMMIT_END, "Legislator commit window has closed");
    ensure(!roundState.legislatorVotes.has(call.sender), "Legislator already committed a vote");

    const vote: LegislatorVoteCommit = {
      legislator: call.sender,
      commitHash: hash,
      committedAt: now,
      revealed: false,
      support: null,
      slashed: false,
    };
    roundState.legislatorVotes.set(call.sender, vote);

    this.ctx.emit({ type: "LegislatorVoteCommitted", marketId, round: resolution.round, legislator: call.sender });
    return { ...vote };
  }

  revealLegislatorVote(call: CallContext, marketId: string, support: boolean, salt: string): LegislatorVoteCommit {
    requireNoValue(call);
    const roundState = requireRound(this.ctx.state, marketId);
    const resolution = roundState.resolution;
    const vote = roundState.legislatorVotes.get(call.sender);
    if (vote === undefined) throw new ValidationError("No vote commit for this legislator", "NOT_FOUND");
    ensure(!vote.revealed, "Vote was already revealed");
    ensure(!vote.slashed, "Vote commit was slashed");
    ensure(!resolution.finalized, "Resolution is already finalized");

    const now = this.ctx.clock.now();
    requireWindow(now >= resolution.proposedAt + LEGISLATOR_COMMIT_END, "Legislator reveal window has not opened");
    requireWindow(now < resolution.proposedAt + LEGISLATOR_REVEAL_END, "Legislator reveal window has closed");

    const recomputed = legislatorVoteCommitment(
      marketId,
      resolution.round,
      support,
      requireBytes32(salt, "Salt"),
      call.sender
    );
    ensure(recomputed === vote.commitHash.toLowerCase(), "Reveal does not match the vote commitment");

    vote.revealed = true;
    vote.support = support;
    if (support) resolution.legislatorSupportVotes += 1;
    else resolution.legislatorOppositionVotes += 1;

    this.ctx.emit({
      type: "LegislatorVoteRevealed",
      marketId,
      round: resolution.round,
      legislator: call.sender,
      support,
    });
    this.checkOverride(roundState);
    return { ...vote };
  }

  /** Returns the reputation penalty applied, or null when the reputation ledger call failed. */
  slashNonRevealingLegislator(call: CallContext, marketId: string, legislator: string): bigint | null {
    requireNoValue(call);
    const account = requireAddress(legislator, "legislator");
    const roundState = requireRound(this.ctx.state, marketId);
    const resolution = roundState.resolution;
    const vote = roundState.legislatorVotes.get(account);
    if (vote === undefined) throw new ValidationError("No vote commit for this legislator", "NOT_FOUND");
    ensure(!vote.revealed, "Vote was revealed");
    ensure(!vote.slashed, "Legislator was already slashed for this round");
    requireWindow(
      this.ctx.clock.now() >= resolution.proposedAt + LEGISLATOR_REVEAL_END,
      "Legislator reveal window is still open"
    );

    vote.slashed = true;
    this.ctx.state.metrics.legislatorsSlashed += 1;

    const { reputation, isolator } = this.ctx;
    const result = isolator.call("reputation", "slash", marketId, () => {
      const penalty = (reputation.balanceOf(account) * LEGISLATOR_SLASH_BPS) / BPS;
      if (penalty > 0n) reputation.slash(account, penalty, `unrevealed vote on ${marketId}#${resolution.round}`);
      return penalty;
    });
    const penalty = result.ok ? result.value : null;

    this.ctx.emit({ type: "LegislatorSlashed", marketId, round: resolution.round, legislator: account, penalty });
    return penalty;
  }

  getLegislatorVote(marketId: string, legislator: string, round?: number): LegislatorVoteCommit | null {
    const roundState = requireRound(this.ctx.state, marketId, round);
    const vote = roundState.legislatorVotes.get(requireAddress(legislator, "legislator"));
    return vote === undefined ? null : { ...vote };
  }

  getRosterSnapshot(marketId: string, round?: number): RosterEntry[] {
    const roundState = requireRound(this.ctx.state, marketId, round);
    return [...roundState.roster].map(([legislator, votingWeight]) => ({ legislator, votingWeight }));
  }

  private requireRosterMember(roundState: RoundState, account: Address): void {
    if (!roundState.roster.has(account)) {
      throw new ValidationError("Sender is not in the legislator roster for this round", "UNAUTHORIZED");
    }
  }

  /** Supermajority of votes cast overrides stake; deferred while a dispute is active. */
  private checkOverride(roundState: RoundState): void {
    const resolution = roundState.resolution;
    if (resolution.finalized || resolution.rejectedByEvidence || hasActiveDispute(roundState)) return;

    const support = BigInt(resolution.legislatorSupportVotes);
    const opposition = BigInt(resolution.legislatorOppositionVotes);
    const threshold = OVERRIDE_THRESHOLD_BPS * (support + opposition);
    let next: ResolutionStatus | null = null;
    if (opposition * BPS >= threshold) next = "REJECTED";
    else if (support * BPS >= threshold) next = "APPROVED";
    if (next === null || next === resolution.status) return;

    resolution.status = next;
    this.ctx.emit({
      type: "ResolutionStatusChanged",
      marketId: resolution.marketId,
      round: resolution.round,
      status: next,
      reason: "legislator-override",
    });
  }
}
