/**
 * Boundaries to the systems the resolution protocol drives but does not own.
 * Calls are synchronous so each protocol operation stays a single atomic unit.
 */

import type { Address } from "viem";

/** Resolution phases of the external market, mirrored best-effort by the protocol. */
export type MarketResolutionState =
  | "TRADING"
  | "SETTLEMENT"
  | "PROPOSED"
  | "DISPUTE_WINDOW"
  | "DISPUTED"
  | "FINALIZED";

export interface MarketInfo {
  tradingEnd: number;
  resolutionTime: number;
  totalStake: bigint;
  outcomeCount: number;
}

export interface PredictionMarketGateway {
  getResolutionState(marketId: string): MarketResolutionState;
  advanceResolutionState(marketId: string, next: MarketResolutionState): void;
  setFinalOutcome(marketId: string, outcome: number): void;
  getMarketInfo(marketId: string): MarketInfo;
  /** Price-linked markets return the feed to bind at proposal time. */
  getPriceFeedId?(marketId: string): string | null;
  getPriceAsset?(marketId: string): string | null;
}

export interface LegislatorRoster {
  isLegislator(account: Address): boolean;
  getVotingWeight(account: Address): bigint;
  getLegislators(): Address[];
}

export interface ReputationLedger {
  balanceOf(account: Address): bigint;
  slash(account: Address, amount: bigint, reason: string): void;
}

export interface RecordedPrice {
  value: bigint;
  timestamp: number;
  round: bigint;
  asset: string;
  recorded: boolean;
  stale: boolean;
}

export interface PriceOracle {
  recordPrice(marketId: string, feedId: string, asset: string): void;
  getRecordedPrice(marketId: string): RecordedPrice;
}

/** Moves native value between participants and protocol custody. Failures abort the operation. */
export interface FundsGateway {
  collect(from: Address, amount: bigint): void;
  transfer(to: Address, amount: bigint): void;
}

export interface Clock {
  /** Unix seconds. */
  now(): number;
}

/** pino-compatible subset; Fastify's logger satisfies it. */
export interface ProtocolLogger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}
