import type { Address } from "viem";
import type { ResolutionProtocol } from "../engine/index.js";
import type { CustodyFundsGateway } from "../services/custody.service.js";
import type { MarketRegistry } from "../services/market-registry.service.js";
import type { InMemoryPriceOracle } from "../services/price-oracle.service.js";

/** Everything the HTTP layer needs; built by server.ts, or by tests with their own clock. */
export interface AppDeps {
  protocol: ResolutionProtocol;
  markets: MarketRegistry;
  funds: CustodyFundsGateway;
  priceOracle: InMemoryPriceOracle | null;
  /** Identity for operator (API key) calls into the protocol. */
  operatorAddress?: Address;
}
