/**
 * BTC SIGNAL DESK - Entrypoint
 *
 * Boot order: config → lexicon → sources → cache/engine → coordinator → HTTP.
 * Run: node dist/backend/src/server.js
 */

import 'dotenv/config';
import { buildApp } from './app.js';
import { createConsoleLogger, errorMessage } from './common/logger.js';
import { ConfigError } from './common/errors.js';
import { loadConfig } from './config/env.js';
import {
  DecisionEngine,
  HistoryLog,
  RefreshCoordinator,
  SignalCache,
  type HistoryEntry,
} from './modules/signal/index.js';
import { createSourceClients, loadSentimentLexicon } from './modules/sources/index.js';

const bootLog = createConsoleLogger('Boot');

async function main(): Promise<void> {
  const config = loadConfig();
  const lexicon = loadSentimentLexicon(config.sources.lexiconPath);

  const clients = createSourceClients({
    timeoutMs: config.refresh.sourceTimeoutMs,
    wallBandPct: config.sources.wallBandPct,
    proxyUrl: config.sources.proxyUrl,
    lexicon,
    logger: createConsoleLogger('Sources'),
  });

  const cache = new SignalCache(new HistoryLog<HistoryEntry>(config.refresh.historyCapacity));
  const coordinator = new RefreshCoordinator({
    clients,
    cache,
    engine: new DecisionEngine(config.decision),
    evaluatorConfig: config.evaluator,
    intervalMs: config.refresh.intervalMs,
    sourceTimeoutMs: config.refresh.sourceTimeoutMs,
    maxSharePrice: config.maxSharePrice,
    logger: createConsoleLogger('SignalRefresh'),
  });

  const app = buildApp({ server: config.server, cache, coordinator });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    bootLog.info({ signal }, 'Shutting down...');
    try {
      await coordinator.stop();
      await app.close();
      bootLog.info({}, 'Shutdown complete');
      process.exit(0);
    } catch (err) {
      bootLog.error({ err: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  coordinator.start();
  await app.listen({ port: config.server.port, host: config.server.host });
  bootLog.info(
    { port: config.server.port, intervalMs: config.refresh.intervalMs },
    'Signal desk started'
  );
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    bootLog.error({ issues: err.issues }, 'Invalid configuration');
  } else {
    bootLog.error({ err: errorMessage(err) }, 'Boot failed');
  }
  process.exit(1);
});
