/**
 * Best-effort calls into collaborators the protocol mirrors but does not depend on.
 * A failure is logged and emitted as ExternalCallFailed; the enclosing operation proceeds
 * because protocol state, not the mirror, is the source of truth.
 *
 * Mirror updates are deferred: they run in `flush` after the operation succeeds and are
 * dropped with `discard` when it fails, so a rolled-back operation never reaches the market.
 */

import type { MarketResolutionState, PredictionMarketGateway, ProtocolLogger } from "../../types/collaborators.js";
import type { ProtocolEventInput } from "./context.js";

export type IsolatedCallResult<T> = { ok: true; value: T } | { ok: false; error: string };

export class ExternalCallIsolator {
  private deferred: Array<() => void> = [];

  constructor(
    private readonly emit: (event: ProtocolEventInput) => void,
    private readonly logger: ProtocolLogger
  ) {}

  call<T>(target: string, action: string, marketId: string | null, fn: () => T): IsolatedCallResult<T> {
    try {
      return { ok: true, value: fn() };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      this.logger.warn({ target, action, marketId, err: error }, "External call failed; continuing");
      this.emit({ type: "ExternalCallFailed", target, action, marketId, error });
      return { ok: false, error };
    }
  }

  defer(effect: () => void): void {
    this.deferred.push(effect);
  }

  flush(): void {
    const effects = this.deferred;
    this.deferred = [];
    for (const effect of effects) effect();
  }

  discard(): void {
    this.deferred = [];
  }
}

export class MarketNotifier {
  constructor(
    private readonly market: PredictionMarketGateway,
    private readonly isolator: ExternalCallIsolator
  ) {}

  private advance(marketId: string, next: MarketResolutionState): boolean {
    return this.isolator.call("market", `advance:${next}`, marketId, () =>
      this.market.advanceResolutionState(marketId, next)
    ).ok;
  }

  /** Proposal accepted: PROPOSED, then straight into the dispute window. */
  markProposed(marketId: string): void {
    this.isolator.defer(() => {
      if (this.advance(marketId, "PROPOSED")) {
        this.advance(marketId, "DISPUTE_WINDOW");
      }
    });
  }

  markDisputed(marketId: string): void {
    this.isolator.defer(() => this.advance(marketId, "DISPUTED"));
  }

  returnToSettlement(marketId: string): void {
    this.isolator.defer(() => this.advance(marketId, "SETTLEMENT"));
  }

  markFinalized(marketId: string, outcome: number): void {
    this.isolator.defer(() => {
      const set = this.isolator.call("market", "setFinalOutcome", marketId, () =>
        this.market.setFinalOutcome(marketId, outcome)
      );
      if (set.ok) {
        this.advance(marketId, "FINALIZED");
      }
    });
  }
}
