import type { Address } from "viem";
import { ValidationError } from "./errors.js";
import type { ExternalCallIsolator, MarketNotifier } from "./market-notifier.js";
import type { ProtocolState } from "./protocol-state.js";
import type { TreasuryLedger } from "./treasury-ledger.js";
import type {
  Clock,
  LegislatorRoster,
  PredictionMarketGateway,
  PriceOracle,
  ProtocolLogger,
  ReputationLedger,
} from "../../types/collaborators.js";
import type { CallContext, ProtocolEvent } from "../../types/resolution.js";

type WithoutTimestamp<E> = E extends unknown ? Omit<E, "at"> : never;

/** An event as emitted by a component; the protocol stamps the time. */
export type ProtocolEventInput = WithoutTimestamp<ProtocolEvent>;

/** Shared wiring handed to every protocol component. */
export interface ProtocolContext {
  state: ProtocolState;
  ledger: TreasuryLedger;
  market: PredictionMarketGateway;
  roster: LegislatorRoster;
  reputation: ReputationLedger;
  priceOracle: PriceOracle | null;
  clock: Clock;
  logger: ProtocolLogger;
  isolator: ExternalCallIsolator;
  notifier: MarketNotifier;
  oracleManagers: ReadonlySet<Address>;
  emit(event: ProtocolEventInput): void;
}

export function paidValue(call: CallContext): bigint {
  return call.value ?? 0n;
}

export function requireNoValue(call: CallContext): void {
  if (paidValue(call) !== 0n) throw new ValidationError("Operation does not accept value");
}

export function requireMinimumValue(call: CallContext, minimum: bigint, label: string): bigint {
  const value = paidValue(call);
  if (value < minimum) {
    throw new ValidationError(`${label} ${value} is below the minimum ${minimum}`);
  }
  return value;
}

export function requireWindow(open: boolean, message: string): void {
  if (!open) throw new ValidationError(message, "WINDOW_CLOSED");
}
