/**
 * ═══════════════════════════════════════════════════════════════════════════
 * POLYMARKET RISK ENGINE - Process entry
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * scanner -> RiskGate (reads ledger) -> breaker-wrapped executor
 *         -> PositionLedger / MetricsRecorder
 *
 * PAPER_TRADING=true (default) simulates fills. Live trading needs
 * PRIVATE_KEY; API credentials are derived when not provided.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import "dotenv/config";
import {
  formatAgentConfig,
  loadAgentConfig,
  type AgentConfig,
} from "./config";
import {
  CircuitBreakerRegistry,
  MetricsRecorder,
  Orchestrator,
  PositionLedger,
  RiskGate,
  ThresholdExitPolicy,
} from "./core";
import { ConfigInvalidError, formatError } from "./errors/app.errors";
import { createExecutor } from "./execution";
import { SnapshotStore } from "./infra/persistence/snapshot-store";
import { performanceSummary, SummaryReporter } from "./reporting/summary";
import { GammaMarketScanner, MarketPriceEstimator } from "./scanner/gamma-scanner";
import { ConsoleLogger, type Logger } from "./utils/logger.util";

function loadConfigOrExit(logger: Logger): AgentConfig {
  try {
    return loadAgentConfig();
  } catch (err) {
    if (err instanceof ConfigInvalidError) {
      logger.error(`[Config] ❌ ${err.errors.length} invalid setting(s):`);
      for (const problem of err.errors) {
        logger.error(`[Config]   - ${problem}`);
      }
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const logger = new ConsoleLogger();
  const config = loadConfigOrExit(logger);
  logger.info(`[Config] Loaded:\n${formatAgentConfig(config)}`);

  const store = new SnapshotStore(config.metrics.file, logger);
  const previous = performanceSummary(store.load());
  if (previous) {
    logger.info(
      `[Startup] 📈 ${previous.snapshots} prior snapshot(s); last total P&L $${previous.latest.pnl.total.toFixed(2)}, ` +
        `range [$${previous.minTotalPnl.toFixed(2)}, $${previous.maxTotalPnl.toFixed(2)}]`,
    );
  }

  const executor = await createExecutor(config, logger);

  let startingBalance = config.initialBalance;
  if (executor.fetchBalance) {
    startingBalance = await executor.fetchBalance();
    logger.info(`[Startup] 💰 Wallet collateral: $${startingBalance.toFixed(2)}`);
  }

  const ledger = new PositionLedger({
    limits: config.risk,
    initialBalance: startingBalance,
    logger,
  });
  const riskGate = new RiskGate({ limits: config.risk, ledger, logger });
  const metrics = new MetricsRecorder({
    periodsPerYear: config.metrics.sharpePeriodsPerYear,
    store,
    logger,
  });
  const breakers = new CircuitBreakerRegistry(config.circuitBreaker, logger);

  const scanner = new GammaMarketScanner(
    {
      baseUrl: config.scan.gammaApiUrl,
      limit: config.scan.marketsFetchLimit,
      minEdge: config.scan.minEdge,
      minLiquidity: config.scan.minLiquidity,
      retry: {
        maxRetries: config.scan.httpMaxRetries,
        baseDelayMs: config.scan.httpRetryDelayMs,
      },
    },
    new MarketPriceEstimator(),
    logger,
  );
  const priceQuote = (tokenId: string): number | undefined => scanner.lastPrice(tokenId);

  const orchestrator = new Orchestrator({
    source: scanner,
    riskGate,
    ledger,
    metrics,
    executor,
    breakers,
    exitPolicy: new ThresholdExitPolicy(priceQuote, config.exits),
    priceQuote,
    logger,
    config: {
      maxTradesPerCycle: config.scan.maxTradesPerCycle,
      executorTimeoutMs: config.execution.timeoutMs,
      cycleIntervalMs: config.scan.intervalSeconds * 1000,
      tradeDelayMs: config.execution.rateLimitDelayMs,
    },
  });

  const reporter = new SummaryReporter({ ledger, metrics, riskGate, breakers, logger });
  reporter.start(config.metrics.summaryIntervalSeconds * 1000);

  const shutdown = (signal: string): void => {
    logger.info(`[Shutdown] Received ${signal}, stopping...`);
    orchestrator.stop();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  try {
    await orchestrator.run();
  } finally {
    reporter.stop();
    reporter.logSummary();
  }
}

main().catch((err) => {
  console.error(`Fatal error in main(): ${formatError(err)}`, err);
  process.exit(1);
});
