import dotenv from "dotenv";
dotenv.config();

import { buildApp } from "./app.js";
import { config } from "./config/index.js";
import { requireAddress } from "./engine/resolution/commitments.js";
import { ResolutionProtocol, systemClock } from "./engine/index.js";
import { closeRedis, getRedisPublisher } from "./lib/redis.js";
import { CustodyFundsGateway } from "./services/custody.service.js";
import { startFinalizationKeeper, stopFinalizationKeeper } from "./services/finalization-keeper.service.js";
import { StaticLegislatorRoster } from "./services/legislator-roster.service.js";
import { MarketRegistry } from "./services/market-registry.service.js";
import { InMemoryPriceOracle } from "./services/price-oracle.service.js";
import { createRedisEventSink } from "./services/protocol-events.service.js";
import { InMemoryReputationLedger } from "./services/reputation.service.js";

const operatorAddress = config.operatorAddress ? requireAddress(config.operatorAddress, "OPERATOR_ADDRESS") : undefined;

const { app: fastify, deps } = await buildApp(
  {
    jwtSecret: config.jwtSecret,
    apiKey: config.apiKey,
    cookieName: config.authCookieName,
    corsOrigin: config.corsOrigin,
  },
  (log) => {
    const markets = new MarketRegistry();
    const funds = new CustodyFundsGateway();
    const priceOracle = new InMemoryPriceOracle(systemClock);
    const protocol = new ResolutionProtocol({
      market: markets,
      roster: new StaticLegislatorRoster(config.legislators),
      reputation: new InMemoryReputationLedger(),
      funds,
      priceOracle,
      logger: log,
      oracleManagers: config.oracleManagerAddresses,
    });
    return { protocol, markets, funds, priceOracle, operatorAddress };
  }
);

const start = async () => {
  try {
    const redis = await getRedisPublisher();
    if (redis !== null) {
      deps.protocol.onEvent(createRedisEventSink(redis, fastify.log));
    }
    await fastify.listen({ port: config.port, host: "0.0.0.0" });
    if (config.finalizationKeeperEnabled) {
      if (operatorAddress === undefined) {
        fastify.log.warn("FINALIZATION_KEEPER_ENABLED is set but OPERATOR_ADDRESS is not; keeper not started");
      } else {
        startFinalizationKeeper(deps.protocol, operatorAddress, config.finalizationKeeperIntervalMs, fastify.log);
      }
    }
    fastify.log.info({ app: config.appName, broadcast: redis !== null }, "Resolution server started");
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

const shutdown = async () => {
  stopFinalizationKeeper();
  await fastify.close();
  await closeRedis();
  process.exit(0);
};

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

void start();
