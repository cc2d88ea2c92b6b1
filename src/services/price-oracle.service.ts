/**
 * Latest-price store for price-linked markets. A proposal binds the market to the feed's
 * current price; readers see it flagged stale once it is older than the staleness limit.
 */

import { ValidationError } from "../engine/resolution/errors.js";
import type { Clock, PriceOracle, RecordedPrice } from "../types/collaborators.js";

export interface PriceUpdate {
  value: bigint;
  timestamp: number;
  round: bigint;
}

const STALE_AFTER_SECONDS = 3_600;

export class InMemoryPriceOracle implements PriceOracle {
  private readonly latest = new Map<string, PriceUpdate>();
  private readonly recorded = new Map<string, Omit<RecordedPrice, "stale">>();

  constructor(private readonly clock: Clock) {}

  pushPrice(feedId: string, update: PriceUpdate): void {
    this.latest.set(feedId, update);
  }

  recordPrice(marketId: string, feedId: string, asset: string): void {
    const update = this.latest.get(feedId);
    if (update === undefined) throw new ValidationError(`No price for feed ${feedId}`, "NOT_FOUND");
    this.recorded.set(marketId, { ...update, asset, recorded: true });
  }

  getRecordedPrice(marketId: string): RecordedPrice {
    const price = this.recorded.get(marketId);
    if (price === undefined) {
      return { value: 0n, timestamp: 0, round: 0n, asset: "", recorded: false, stale: false };
    }
    return { ...price, stale: this.clock.now() - price.timestamp > STALE_AFTER_SECONDS };
  }
}
