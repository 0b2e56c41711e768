#!/usr/bin/env node
import 'dotenv/config';
import type { AxiosInstance } from 'axios';
import { loadConfig, logConfigSummary, ScraperConfig, validateConfig } from './config/env';
import { createLogger, StructuredLogger } from './core/StructuredLogger';
import { HttpClient } from './core/HttpClient';
import { ConfigError, ScraperError, toError } from './core/errors';
import { ListingIdentifierSource } from './sources/IdentifierSource';
import { BondPageFetcher } from './scraper/BondPageFetcher';
import { ScrapeRun } from './pipeline/ScrapeRun';

export function buildScrapeRun(
  config: ScraperConfig,
  logger: StructuredLogger,
  axiosInstance?: AxiosInstance
): ScrapeRun {
  const httpClient = new HttpClient('borsa-http', {
    timeoutMs: config.http.timeoutMs,
    maxRetries: config.http.maxRetries,
    baseRetryDelayMs: config.http.retryDelayMs,
    maxRetryDelayMs: config.http.retryDelayMs * 8,
    userAgent: config.http.userAgent
  }, logger, axiosInstance);

  return new ScrapeRun({
    identifierSource: new ListingIdentifierSource(httpClient, config.identifiers, logger.child({ component: 'identifiers' })),
    fetcher: new BondPageFetcher(httpClient, {
      pageBaseUrl: config.pageBaseUrl,
      chartUrl: config.chartUrl
    }, logger.child({ component: 'fetcher' })),
    logger,
    resultsPath: config.resultsPath,
    skipLogPath: config.skipLogPath,
    concurrency: config.concurrency
  });
}

/**
 * Point d'entrée sans argument : 0 si la table est publiée (même avec des ISIN ignorés),
 * 1 sur échec fatal (source indisponible, écriture impossible, annulation).
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const config = loadConfig(env);
  const logger = createLogger(config.logLevel, config.logFormat, { service: 'bond-scraper' });

  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(`⚠️ ${warning}`, { component: 'config' });
  }
  if (!validation.isValid) {
    logger.fatal('❌ Configuration invalide', new ConfigError(validation.errors));
    return 1;
  }
  logConfigSummary(config, logger);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`🛑 Received ${signal}, cancelling run...`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const timeout = config.runTimeoutMs > 0
    ? setTimeout(() => {
        logger.warn(`⏰ RUN_TIMEOUT_MS (${config.runTimeoutMs}ms) atteint, annulation`);
        controller.abort();
      }, config.runTimeoutMs)
    : null;

  const run = buildScrapeRun(config, logger);

  try {
    const result = await run.execute(controller.signal);
    logger.info(`✅ Table publiée : ${result.records.length}/${result.stats.total} obligations`, {
      runId: result.runId,
      path: result.resultsPath,
      skipped: result.stats.skipped
    });
    return 0;
  } catch (error) {
    const err = toError(error);
    const cause = err instanceof ScraperError ? `${err.code}: ${err.message}` : err.message;
    logger.fatal(`❌ Échec de l'exécution (${run.getFailedStage() ?? 'Unknown'}) - ${cause}`, err, { runId: run.runId });
    return 1;
  } finally {
    if (timeout) clearTimeout(timeout);
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Erreur fatale:', error);
      process.exitCode = 1;
    });
}
