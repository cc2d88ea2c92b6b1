/**
 * In-process mirror of the prediction markets the protocol resolves. Operators register
 * markets and move them into settlement; the protocol advances them from there.
 */

import { ValidationError } from "../engine/resolution/errors.js";
import type { MarketInfo, MarketResolutionState, PredictionMarketGateway } from "../types/collaborators.js";

export interface RegisteredMarket extends MarketInfo {
  marketId: string;
  state: MarketResolutionState;
  finalOutcome: number | null;
  priceFeedId: string | null;
  priceAsset: string | null;
}

export interface RegisterMarketInput {
  marketId: string;
  tradingEnd: number;
  resolutionTime: number;
  outcomeCount: number;
  totalStake?: bigint;
  state?: MarketResolutionState;
  priceFeedId?: string | null;
  priceAsset?: string | null;
}

export class MarketRegistry implements PredictionMarketGateway {
  private readonly markets = new Map<string, RegisteredMarket>();

  register(input: RegisterMarketInput): RegisteredMarket {
    if (this.markets.has(input.marketId)) {
      throw new ValidationError(`Market ${input.marketId} is already registered`);
    }
    if (!Number.isInteger(input.outcomeCount) || input.outcomeCount < 2) {
      throw new ValidationError("A market needs at least two outcomes");
    }
    const market: RegisteredMarket = {
      marketId: input.marketId,
      tradingEnd: input.tradingEnd,
      resolutionTime: input.resolutionTime,
      outcomeCount: input.outcomeCount,
      totalStake: input.totalStake ?? 0n,
      state: input.state ?? "TRADING",
      finalOutcome: null,
      priceFeedId: input.priceFeedId ?? null,
      priceAsset: input.priceAsset ?? null,
    };
    this.markets.set(input.marketId, market);
    return { ...market };
  }

  get(marketId: string): RegisteredMarket | null {
    const market = this.markets.get(marketId);
    return market === undefined ? null : { ...market };
  }

  list(): RegisteredMarket[] {
    return [...this.markets.values()].map((m) => ({ ...m }));
  }

  getResolutionState(marketId: string): MarketResolutionState {
    return this.require(marketId).state;
  }

  advanceResolutionState(marketId: string, next: MarketResolutionState): void {
    const market = this.require(marketId);
    if (market.state === "FINALIZED") {
      throw new ValidationError(`Market ${marketId} is finalized`);
    }
    market.state = next;
  }

  setFinalOutcome(marketId: string, outcome: number): void {
    const market = this.require(marketId);
    if (market.finalOutcome !== null) {
      throw new ValidationError(`Market ${marketId} already has a final outcome`);
    }
    market.finalOutcome = outcome;
  }

  getMarketInfo(marketId: string): MarketInfo {
    const { tradingEnd, resolutionTime, totalStake, outcomeCount } = this.require(marketId);
    return { tradingEnd, resolutionTime, totalStake, outcomeCount };
  }

  getPriceFeedId(marketId: string): string | null {
    return this.require(marketId).priceFeedId;
  }

  getPriceAsset(marketId: string): string | null {
    return this.require(marketId).priceAsset;
  }

  private require(marketId: string): RegisteredMarket {
    const market = this.markets.get(marketId);
    if (market === undefined) throw new ValidationError(`Market ${marketId} not found`, "NOT_FOUND");
    return market;
  }
}
