/**
 * ═══════════════════════════════════════════════════════════════════════════
 * WHALE COPY ENGINE - Entry point
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Watches the configured whale wallets and copies their trades through the
 * filter, sizing, risk and execution pipeline into the position ledger.
 *
 * REQUIRED ENV (live trading only):
 *   ARMED=true   - Send real orders; otherwise orders are simulated
 *   PRIVATE_KEY  - Wallet private key
 *
 * COMMON ENV:
 *   WHALE_ADDRESSES    - Comma-separated wallets to copy
 *   WHALE_METRICS_FILE - Whale quality metrics (default: ./data/whales.json)
 *   NAV_USD            - Starting net asset value (default: 10000)
 *   RISK_PRESET        - conservative | balanced | aggressive
 *   DATABASE_PATH      - SQLite file (default: ./data/copy-engine.db)
 * ═══════════════════════════════════════════════════════════════════════════
 */

import "dotenv/config";
import axios from "axios";
import { loadEngineConfig } from "./config";
import type { EngineConfig } from "./config";
import { AuditTrail } from "./core/audit-trail";
import { CopyTradingEngine } from "./core/copy-trading-engine";
import { FillEventBus } from "./core/fill-events";
import { OrderExecutor } from "./core/order-executor";
import { PositionLedger } from "./core/position-ledger";
import { PositionSizer } from "./core/position-sizer";
import { PortfolioReporter } from "./core/reporting";
import { RiskManager } from "./core/risk-manager";
import { SignalFilterPipeline } from "./core/signal-filter";
import { formatDuration, formatPct, formatPnl, formatUsd } from "./infra/logging";
import { OrderRepository, PositionRepository, openDatabase } from "./infra/persistence";
import type { SqliteDatabase } from "./infra/persistence";
import { createClobClient } from "./infrastructure/clob-client.factory";
import { normalizeRestOrderbook } from "./lib/orderbook-utils";
import { safeErrorToString } from "./lib/error-handling";
import { ClobExchangeClient } from "./services/clob-exchange-client";
import type { ExchangeClient } from "./services/interfaces";
import { GammaMarketCatalog } from "./services/market-catalog";
import { PriceFeed } from "./services/price-feed";
import { SimulatedExchangeClient } from "./services/simulated-exchange-client";
import { UserFillStream } from "./services/user-fill-stream";
import { WhaleActivityFeed } from "./services/whale-activity-feed";
import { StaticWhaleDirectory } from "./services/whale-directory";
import { ConsoleLogger, type Logger } from "./utils/logger.util";

interface RawBook {
  bids?: Array<{ price: string; size: string }>;
  asks?: Array<{ price: string; size: string }>;
}

export interface Runtime {
  engine: CopyTradingEngine;
  reporter: PortfolioReporter;
  risk: RiskManager;
  stop(): void;
}

/**
 * Build and start every component. Orders left over from a previous run
 * are reconciled before any feed starts.
 */
export async function startRuntime(config: EngineConfig, logger: Logger): Promise<Runtime> {
  const db: SqliteDatabase = openDatabase(config.databasePath, logger);
  const audit = new AuditTrail(db);
  const orders = new OrderRepository(db, audit);
  const positions = new PositionRepository(db, audit);

  const clobHttp = axios.create({ baseURL: config.feeds.clobHost });
  const dataHttp = axios.create({ baseURL: config.feeds.dataApiHost });
  const gammaHttp = axios.create({ baseURL: config.feeds.gammaApiHost });

  const bus = new FillEventBus(logger);
  let exchange: ExchangeClient;
  let userStream: UserFillStream | undefined;
  if (config.auth.armed) {
    const { client, creds } = await createClobClient(config.auth, config.feeds.clobHost, logger);
    exchange = new ClobExchangeClient(client, logger);
    userStream = new UserFillStream(
      {
        url: config.feeds.wsUserUrl,
        credentials: { apiKey: creds.key, secret: creds.secret, passphrase: creds.passphrase },
      },
      bus,
      logger,
    );
  } else {
    logger.warn("[Start] ARMED is not set; orders are simulated against live books");
    exchange = new SimulatedExchangeClient(async (tokenId) => {
      const { data } = await clobHttp.get<RawBook>("/book", { params: { token_id: tokenId }, timeout: 5_000 });
      return normalizeRestOrderbook(tokenId, data);
    }, logger);
  }

  const whales = StaticWhaleDirectory.fromFile(config.feeds.whaleMetricsFile, logger);
  const executor = new OrderExecutor(orders, audit, exchange, bus, config.execution, logger);
  const ledger = new PositionLedger(positions, config.ledger, logger);
  const reporter = new PortfolioReporter(positions, config.ledger);
  const risk = new RiskManager(config.risk, config.navUsd, logger);
  const engine = new CopyTradingEngine({
    filter: new SignalFilterPipeline(config.filter, logger),
    sizer: new PositionSizer(config.sizing, logger),
    risk,
    executor,
    ledger,
    reporter,
    exchange,
    catalog: new GammaMarketCatalog(gammaHttp, logger),
    whales,
    logger,
  });

  await engine.recover();

  const whaleFeed = new WhaleActivityFeed({
    http: dataHttp,
    logger,
    whaleAddresses: config.feeds.whaleAddresses,
    pollIntervalMs: config.feeds.whalePollIntervalMs,
    onTrade: (event) => engine.onWhaleActivity(event),
  });
  const priceFeed = new PriceFeed({
    http: clobHttp,
    logger,
    pollIntervalMs: config.feeds.pricePollIntervalMs,
    tokens: () => ledger.getLivePositions().map((p) => p.tokenId),
    onPrice: async (tokenId, price) => {
      await engine.onPriceTick(tokenId, price);
    },
  });

  engine.start();
  userStream?.start();
  priceFeed.start();
  await whaleFeed.start();

  return {
    engine,
    reporter,
    risk,
    stop: () => {
      whaleFeed.stop();
      priceFeed.stop();
      userStream?.stop();
      engine.stop();
      db.close();
    },
  };
}

function logSummary(runtime: Runtime, logger: Logger, startedAt: number): void {
  const perf = runtime.reporter.getPerformance();
  const exposure = runtime.reporter.getExposureSummary();
  const snapshot = runtime.risk.getSnapshot();
  logger.info(
    `[Start] Open ${perf.openCount} | Closed ${perf.closedCount} | Exposure ${formatUsd(exposure.totalExposureUsd)} | ` +
      `P&L ${formatPnl(perf.totalPnl)} | Win ${formatPct(perf.winRate, 1)} | Breaker ${snapshot.breaker} | ` +
      `Up ${formatDuration(Date.now() - startedAt)}`,
  );
}

async function main(): Promise<void> {
  const logger = new ConsoleLogger();
  const config = loadEngineConfig();
  logger.info(
    `[Start] Preset ${config.preset} | NAV ${formatUsd(config.navUsd)} | ${config.feeds.whaleAddresses.length} whale(s) | ${
      config.auth.armed ? "LIVE" : "SIMULATED"
    }`,
  );

  const startedAt = Date.now();
  const runtime = await startRuntime(config, logger);
  const summaryTimer = setInterval(() => logSummary(runtime, logger, startedAt), 5 * 60_000);

  const shutdown = (signal: string): void => {
    logger.info(`[Start] Received ${signal}, shutting down...`);
    clearInterval(summaryTimer);
    logSummary(runtime, logger, startedAt);
    runtime.stop();
    process.exit(0);
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

// Check if this file is the entry point
function isDirectlyExecuted(): boolean {
  if (process.env.NODE_ENV === "test") return false;
  const scriptPath = process.argv[1] || "";
  return scriptPath.endsWith("start.js") || scriptPath.endsWith("start.ts");
}

if (isDirectlyExecuted()) {
  main().catch((err) => {
    console.error("Fatal error:", safeErrorToString(err));
    process.exit(1);
  });
}
