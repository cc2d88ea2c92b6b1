/**
 * Public entry point of the resolution protocol.
 *
 * Every mutating operation runs through `execute`: one operation at a time (re-entry is
 * rejected), all-or-nothing (state is restored from a snapshot on any error), and events
 * reach listeners only after the operation has committed. Incoming value is collected as
 * the operation runs; payouts and market updates wait until it has succeeded.
 */

import type { Address } from "viem";
import { requireAddress } from "./commitments.js";
import type { ProtocolContext, ProtocolEventInput } from "./context.js";
import { DisputeEngine, type DisputeInput } from "./dispute-engine.js";
import { ReentrancyError } from "./errors.js";
import { EvidenceChallenges } from "./evidence-challenges.js";
import { Finalization, type FinalizableRound } from "./finalization.js";
import { LegislatorVoting } from "./legislator-voting.js";
import { ExternalCallIsolator, MarketNotifier } from "./market-notifier.js";
import { ProposalEngine, type ProposeInput } from "./proposal-engine.js";
import {
  createProtocolState,
  getRounds,
  requireRound,
  restoreState,
  snapshotState,
  type ProtocolState,
} from "./protocol-state.js";
import { StakingLedger, type StakeSide } from "./staking-ledger.js";
import { TreasuryLedger, type TreasurySnapshot } from "./treasury-ledger.js";
import type {
  Clock,
  FundsGateway,
  LegislatorRoster,
  PredictionMarketGateway,
  PriceOracle,
  ProtocolLogger,
  ReputationLedger,
} from "../../types/collaborators.js";
import type {
  CallContext,
  Dispute,
  DisputeOutcomePreview,
  EvidenceChallenge,
  LegislatorVoteCommit,
  ProtocolEvent,
  ProtocolMetrics,
  Resolution,
  ResolutionCommit,
  RosterEntry,
  Stake,
} from "../../types/resolution.js";

export type ProtocolEventListener = (event: ProtocolEvent) => void;

export interface ResolutionProtocolOptions {
  market: PredictionMarketGateway;
  roster: LegislatorRoster;
  reputation: ReputationLedger;
  funds: FundsGateway;
  logger: ProtocolLogger;
  priceOracle?: PriceOracle | null;
  clock?: Clock;
  /** Accounts allowed to withdraw fees and adjudicate evidence challenges. */
  oracleManagers?: Iterable<string>;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

export class ResolutionProtocol {
  private readonly state: ProtocolState = createProtocolState();
  private readonly ctx: ProtocolContext;
  private readonly listeners = new Set<ProtocolEventListener>();
  private pending: ProtocolEvent[] = [];
  private activeOperation: string | null = null;

  private readonly proposals: ProposalEngine;
  private readonly staking: StakingLedger;
  private readonly evidence: EvidenceChallenges;
  private readonly voting: LegislatorVoting;
  private readonly disputes: DisputeEngine;
  private readonly finalization: Finalization;

  constructor(options: ResolutionProtocolOptions) {
    const clock = options.clock ?? systemClock;
    const emit = (event: ProtocolEventInput): void => {
      this.pending.push({ ...event, at: clock.now() });
    };
    const isolator = new ExternalCallIsolator(emit, options.logger);
    this.ctx = {
      state: this.state,
      ledger: new TreasuryLedger(this.state, options.funds),
      market: options.market,
      roster: options.roster,
      reputation: options.reputation,
      priceOracle: options.priceOracle ?? null,
      clock,
      logger: options.logger,
      isolator,
      notifier: new MarketNotifier(options.market, isolator),
      oracleManagers: new Set([...(options.oracleManagers ?? [])].map((a) => requireAddress(a, "oracle manager"))),
      emit,
    };
    this.proposals = new ProposalEngine(this.ctx);
    this.staking = new StakingLedger(this.ctx);
    this.evidence = new EvidenceChallenges(this.ctx);
    this.voting = new LegislatorVoting(this.ctx);
    this.disputes = new DisputeEngine(this.ctx);
    this.finalization = new Finalization(this.ctx);
  }

  /** Subscribe to committed events; returns an unsubscribe function. */
  onEvent(listener: ProtocolEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // Proposal

  commitResolution(call: CallContext, marketId: string, commitHash: string): ResolutionCommit {
    return this.execute("commitResolution", marketId, call, (c) =>
      this.proposals.commitResolution(c, marketId, commitHash)
    );
  }

  proposeResolution(call: CallContext, marketId: string, input: ProposeInput): Resolution {
    return this.execute("proposeResolution", marketId, call, (c) =>
      this.proposals.proposeResolution(c, marketId, input)
    );
  }

  slashUnrevealedCommit(call: CallContext, marketId: string, committer: string): bigint {
    return this.execute("slashUnrevealedCommit", marketId, call, (c) =>
      this.proposals.slashUnrevealedCommit(c, marketId, committer)
    );
  }

  // Staking

  supportResolution(call: CallContext, marketId: string): Stake {
    return this.execute("supportResolution", marketId, call, (c) => this.staking.supportResolution(c, marketId));
  }

  opposeResolution(call: CallContext, marketId: string): Stake {
    return this.execute("opposeResolution", marketId, call, (c) => this.staking.opposeResolution(c, marketId));
  }

  // Evidence

  challengeEvidence(call: CallContext, marketId: string, reason: string): EvidenceChallenge {
    return this.execute("challengeEvidence", marketId, call, (c) =>
      this.evidence.challengeEvidence(c, marketId, reason)
    );
  }

  resolveEvidenceChallenge(
    call: CallContext,
    marketId: string,
    index: number,
    upheld: boolean,
    round?: number
  ): bigint {
    return this.execute("resolveEvidenceChallenge", marketId, call, (c) =>
      this.evidence.resolveEvidenceChallenge(c, marketId, index, upheld, round)
    );
  }

  // Legislator voting

  commitLegislatorVote(call: CallContext, marketId: string, commitHash: string): LegislatorVoteCommit {
    return this.execute("commitLegislatorVote", marketId, call, (c) =>
      this.voting.commitLegislatorVote(c, marketId, commitHash)
    );
  }

  revealLegislatorVote(call: CallContext, marketId: string, support: boolean, salt: string): LegislatorVoteCommit {
    return this.execute("revealLegislatorVote", marketId, call, (c) =>
      this.voting.revealLegislatorVote(c, marketId, support, salt)
    );
  }

  slashNonRevealingLegislator(call: CallContext, marketId: string, legislator: string): bigint | null {
    return this.execute("slashNonRevealingLegislator", marketId, call, (c) =>
      this.voting.slashNonRevealingLegislator(c, marketId, legislator)
    );
  }

  // Disputes

  disputeResolution(call: CallContext, marketId: string, input: DisputeInput): Dispute {
    return this.execute("disputeResolution", marketId, call, (c) =>
      this.disputes.disputeResolution(c, marketId, input)
    );
  }

  supportDispute(call: CallContext, marketId: string, index: number): Stake {
    return this.execute("supportDispute", marketId, call, (c) => this.disputes.supportDispute(c, marketId, index));
  }

  endorseDispute(call: CallContext, marketId: string, index: number): Dispute {
    return this.execute("endorseDispute", marketId, call, (c) => this.disputes.endorseDispute(c, marketId, index));
  }

  // Finalization and claims

  finalizeResolution(call: CallContext, marketId: string, round?: number): Resolution {
    return this.execute("finalizeResolution", marketId, call, (c) =>
      this.finalization.finalizeResolution(c, marketId, round)
    );
  }

  claimResolutionReward(call: CallContext, marketId: string, round?: number): bigint {
    return this.execute("claimResolutionReward", marketId, call, (c) =>
      this.finalization.claimResolutionReward(c, marketId, round)
    );
  }

  claimOppositionReward(call: CallContext, marketId: string, round?: number): bigint {
    return this.execute("claimOppositionReward", marketId, call, (c) =>
      this.finalization.claimOppositionReward(c, marketId, round)
    );
  }

  claimDisputeReward(call: CallContext, marketId: string, index: number, round?: number): bigint {
    return this.execute("claimDisputeReward", marketId, call, (c) =>
      this.finalization.claimDisputeReward(c, marketId, index, round)
    );
  }

  reclaimDisputeStake(call: CallContext, marketId: string, index: number, round?: number): bigint {
    return this.execute("reclaimDisputeStake", marketId, call, (c) =>
      this.finalization.reclaimDisputeStake(c, marketId, index, round)
    );
  }

  withdrawProtocolFees(call: CallContext, to: string, amount: bigint): void {
    this.execute("withdrawProtocolFees", null, call, (c) => this.finalization.withdrawProtocolFees(c, to, amount));
  }

  // Views

  getResolution(marketId: string, round?: number): Resolution {
    const { resolution } = requireRound(this.state, marketId, round);
    return { ...resolution, settlement: resolution.settlement === null ? null : { ...resolution.settlement } };
  }

  getRoundCount(marketId: string): number {
    return getRounds(this.state, marketId).length;
  }

  getCommit(marketId: string, committer: string): ResolutionCommit | null {
    return this.proposals.getCommit(marketId, committer);
  }

  getStake(marketId: string, account: string, side: StakeSide, round?: number): Stake | null {
    return this.staking.getStake(marketId, account, side, round);
  }

  getTimingBonus(marketId: string, at?: number): bigint {
    return this.staking.getTimingBonus(marketId, at ?? this.ctx.clock.now());
  }

  getEvidenceChallenges(marketId: string, round?: number): EvidenceChallenge[] {
    return this.evidence.list(marketId, round);
  }

  getLegislatorVote(marketId: string, legislator: string, round?: number): LegislatorVoteCommit | null {
    return this.voting.getLegislatorVote(marketId, legislator, round);
  }

  getRosterSnapshot(marketId: string, round?: number): RosterEntry[] {
    return this.voting.getRosterSnapshot(marketId, round);
  }

  getDisputes(marketId: string, round?: number): Dispute[] {
    return this.disputes.getDisputes(marketId, round);
  }

  getDisputeStake(marketId: string, index: number, supporter: string, round?: number): Stake | null {
    return this.disputes.getDisputeStake(marketId, index, supporter, round);
  }

  getRequiredDisputeBond(marketId: string): bigint {
    return this.disputes.getRequiredDisputeBond(marketId);
  }

  previewDisputeOutcome(marketId: string, round?: number): DisputeOutcomePreview {
    return this.disputes.previewDisputeOutcome(marketId, round);
  }

  listFinalizable(): FinalizableRound[] {
    return this.finalization.listFinalizable();
  }

  getTreasury(): TreasurySnapshot {
    return this.ctx.ledger.snapshot();
  }

  getEarmarked(marketId: string): bigint {
    return this.ctx.ledger.earmarkedFor(marketId);
  }

  getMetrics(): ProtocolMetrics {
    return { ...this.state.metrics };
  }

  isOracleManager(account: Address): boolean {
    return this.ctx.oracleManagers.has(account);
  }

  private execute<T>(
    operation: string,
    marketId: string | null,
    call: CallContext,
    fn: (call: CallContext) => T
  ): T {
    if (this.activeOperation !== null) throw new ReentrancyError(operation);
    const { result, events } = this.runAtomically(operation, call, fn);

    this.ctx.logger.info({ operation, marketId, sender: call.sender, events: events.length }, "Protocol operation committed");
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.ctx.logger.error({ err, event: event.type }, "Protocol event listener failed");
        }
      }
    }
    return result;
  }

  private runAtomically<T>(
    operation: string,
    call: CallContext,
    fn: (call: CallContext) => T
  ): { result: T; events: ProtocolEvent[] } {
    this.activeOperation = operation;
    const snapshot = snapshotState(this.state);
    this.pending = [];
    try {
      const result = fn({ sender: requireAddress(call.sender, "sender"), value: call.value });
      this.ctx.ledger.assertSolvent();
      // Payouts and mirror updates leave the protocol only once every check has passed.
      this.ctx.ledger.settleTransfers();
      this.ctx.isolator.flush();
      return { result, events: this.pending };
    } catch (err) {
      restoreState(this.state, snapshot);
      this.ctx.ledger.discardTransfers();
      this.ctx.isolator.discard();
      throw err;
    } finally {
      this.pending = [];
      this.activeOperation = null;
    }
  }
}
