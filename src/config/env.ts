/**
 * Configuration du scraper construite à partir des variables d'environnement.
 * Pas de singleton : `loadConfig()` renvoie un objet passé explicitement aux composants.
 */

import type { StructuredLogger } from '../core/StructuredLogger';

// Helpers pour parser les valeurs
export const toBool = (value: string | undefined, defaultValue: boolean = false): boolean => {
  if (value == null || value.trim() === '') return defaultValue;
  const s = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
};

export const toNumber = (value?: string, defaultValue: number = 0): number => {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
};

export const toString = (value?: string, defaultValue: string = ''): string => {
  return value?.trim() || defaultValue;
};

// Une variable définie mais vide est conservée (permet de désactiver une option)
const toOptionalString = (value: string | undefined, defaultValue: string): string => {
  return value === undefined ? defaultValue : value.trim();
};

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36';

export interface IdentifierSourceConfig {
  url: string;
  delimiter: string;
  isinColumn: string;
  currencyColumn: string;
  /** Vide = pas de filtre sur la devise */
  currency: string;
  strictIsin: boolean;
}

export interface HttpConfig {
  userAgent: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface ScraperConfig {
  nodeEnv: string;
  logLevel: string;
  logFormat: 'json' | 'pretty';
  identifiers: IdentifierSourceConfig;
  pageBaseUrl: string;
  chartUrl: string;
  http: HttpConfig;
  concurrency: number;
  runTimeoutMs: number;
  resultsPath: string;
  skipLogPath: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const nodeEnv = toString(env.NODE_ENV, 'development');

  return {
    nodeEnv,
    logLevel: toString(env.LOG_LEVEL, 'info').toLowerCase(),
    logFormat: toString(env.LOG_FORMAT, nodeEnv === 'production' ? 'json' : 'pretty') === 'json' ? 'json' : 'pretty',

    identifiers: {
      url: toString(env.IDENTIFIER_SOURCE_URL, 'https://www.simpletoolsforinvestors.eu/data/listino/listino.csv'),
      delimiter: toString(env.IDENTIFIER_CSV_DELIMITER, ';'),
      isinColumn: toString(env.IDENTIFIER_ISIN_COLUMN, 'ISIN Code'),
      currencyColumn: toString(env.IDENTIFIER_CURRENCY_COLUMN, 'Currency'),
      currency: toOptionalString(env.IDENTIFIER_CURRENCY, 'EUR').toUpperCase(),
      strictIsin: toBool(env.STRICT_ISIN)
    },

    pageBaseUrl: toString(
      env.PAGE_BASE_URL,
      'https://www.borsaitaliana.it/borsa/obbligazioni/mot/euro-obbligazioni/scheda'
    ).replace(/\/+$/, ''),
    chartUrl: toString(env.CHART_URL, 'https://charts.borsaitaliana.it/charts/services/ChartWService.asmx/GetCvals'),

    http: {
      userAgent: toString(env.HTTP_USER_AGENT, DEFAULT_USER_AGENT),
      timeoutMs: toNumber(env.HTTP_TIMEOUT_MS, 10000),
      maxRetries: toNumber(env.HTTP_MAX_RETRIES, 2),
      retryDelayMs: toNumber(env.HTTP_RETRY_DELAY_MS, 1000)
    },

    concurrency: Math.floor(toNumber(env.CONCURRENCY, 8)),
    runTimeoutMs: toNumber(env.RUN_TIMEOUT_MS, 0),

    resultsPath: toString(env.RESULTS_PATH, 'results/bond_info_extracted.csv'),
    skipLogPath: toOptionalString(env.SKIP_LOG_PATH, 'results/skipped_isins.csv')
  };
}

// Validation de la configuration
export function validateConfig(config: ScraperConfig): { isValid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const [name, url] of [
    ['IDENTIFIER_SOURCE_URL', config.identifiers.url],
    ['PAGE_BASE_URL', config.pageBaseUrl],
    ['CHART_URL', config.chartUrl]
  ] as const) {
    if (!/^https?:\/\//i.test(url)) {
      errors.push(`${name} doit être une URL http(s): ${url}`);
    }
  }

  if (config.identifiers.delimiter.length !== 1) {
    errors.push('IDENTIFIER_CSV_DELIMITER doit être un seul caractère');
  }

  if (config.http.timeoutMs <= 0) {
    errors.push('HTTP_TIMEOUT_MS doit être > 0');
  } else if (config.http.timeoutMs > 60000) {
    warnings.push(`HTTP_TIMEOUT_MS=${config.http.timeoutMs} - timeout très long pour ~2000 instruments`);
  }

  if (config.http.maxRetries < 0 || !Number.isInteger(config.http.maxRetries)) {
    errors.push('HTTP_MAX_RETRIES doit être un entier >= 0');
  }

  if (config.http.retryDelayMs < 0) {
    errors.push('HTTP_RETRY_DELAY_MS doit être >= 0');
  }

  if (config.concurrency < 1) {
    errors.push('CONCURRENCY doit être >= 1');
  } else if (config.concurrency > 32) {
    warnings.push(`CONCURRENCY=${config.concurrency} - risque de blocage par le site source`);
  }

  if (config.runTimeoutMs < 0) {
    errors.push('RUN_TIMEOUT_MS doit être >= 0 (0 = pas de limite)');
  }

  if (!config.resultsPath) {
    errors.push('RESULTS_PATH manquant');
  }

  if (config.skipLogPath && config.skipLogPath === config.resultsPath) {
    errors.push('SKIP_LOG_PATH doit être différent de RESULTS_PATH');
  }

  if (!config.identifiers.currency) {
    warnings.push('IDENTIFIER_CURRENCY vide - aucun filtre de devise appliqué');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

// Résumé de la configuration pour les logs
export function getConfigSummary(config: ScraperConfig): Record<string, string | number | boolean> {
  return {
    NODE_ENV: config.nodeEnv,
    LOG_LEVEL: config.logLevel,
    IDENTIFIER_SOURCE_URL: config.identifiers.url,
    IDENTIFIER_CURRENCY: config.identifiers.currency || '(all)',
    STRICT_ISIN: config.identifiers.strictIsin,
    PAGE_BASE_URL: config.pageBaseUrl,
    HTTP_TIMEOUT_MS: config.http.timeoutMs,
    HTTP_MAX_RETRIES: config.http.maxRetries,
    CONCURRENCY: config.concurrency,
    RUN_TIMEOUT_MS: config.runTimeoutMs,
    RESULTS_PATH: config.resultsPath,
    SKIP_LOG_PATH: config.skipLogPath || '(disabled)'
  };
}

export function logConfigSummary(config: ScraperConfig, logger: StructuredLogger): void {
  logger.info('🔧 Configuration du scraper', { component: 'config', ...getConfigSummary(config) });
}
