/**
 * Optional in-process job: finalize every round whose dispute window has closed.
 * Finalization is permissionless; the keeper calls it as the operator identity.
 */

import type { Address } from "viem";
import type { FinalizableRound, ResolutionProtocol } from "../engine/index.js";
import type { ProtocolLogger } from "../types/collaborators.js";

export type FinalizationTarget = Pick<ResolutionProtocol, "listFinalizable" | "finalizeResolution">;

export interface SweepResult {
  finalized: FinalizableRound[];
  failed: Array<FinalizableRound & { error: string }>;
}

let intervalId: ReturnType<typeof setInterval> | null = null;

export function runFinalizationSweep(
  protocol: FinalizationTarget,
  operator: Address,
  log: ProtocolLogger
): SweepResult {
  const result: SweepResult = { finalized: [], failed: [] };
  for (const target of protocol.listFinalizable()) {
    try {
      const resolution = protocol.finalizeResolution({ sender: operator }, target.marketId, target.round);
      result.finalized.push(target);
      log.info({ ...target, status: resolution.status }, "Keeper finalized resolution");
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      result.failed.push({ ...target, error });
      log.warn({ ...target, err: error }, "Keeper finalization failed");
    }
  }
  return result;
}

export function startFinalizationKeeper(
  protocol: FinalizationTarget,
  operator: Address,
  intervalMs: number,
  log: ProtocolLogger
): void {
  if (intervalId !== null) return;
  log.info({ intervalMs }, "Finalization keeper started");
  intervalId = setInterval(() => {
    runFinalizationSweep(protocol, operator, log);
  }, intervalMs);
}

export function stopFinalizationKeeper(): void {
  if (intervalId !== null) {
    clearInterval(intervalId);
    intervalId = null;
  }
}
