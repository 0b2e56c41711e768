import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import { IdentifierSource } from '../sources/IdentifierSource';
import { InstrumentFetcher } from '../scraper/BondPageFetcher';
import { parseInstrument } from '../scraper/BondPageParser';
import { MARKET_ZONE } from '../scraper/VolumeHistory';
import { ResultTable, serializeResultTable, serializeSkipLog, writeAtomically } from '../store/ResultTableWriter';
import { rateLiquidity } from '../analysis/liquidity';
import { RunStats, RunStatsTracker, SkipEntry } from '../metrics/RunStats';
import { StructuredLogger } from '../core/StructuredLogger';
import { WorkerPool } from '../core/WorkerPool';
import {
  FetchFailedError,
  RunCancelledError,
  ScraperError,
  UnparseableRecordError,
  WriteFailedError,
  toError
} from '../core/errors';
import { BondRecord, RatedBondRecord } from '../types/bond';

export type RunStage = 'Init' | 'LoadingIdentifiers' | 'Fetching' | 'Writing' | 'Done' | 'Failed';

export interface ScrapeRunDeps {
  identifierSource: IdentifierSource;
  fetcher: InstrumentFetcher;
  logger: StructuredLogger;
  resultsPath: string;
  /** Vide = pas de journal des ISIN ignorés sur disque */
  skipLogPath?: string;
  concurrency: number;
  writeFile?: (targetPath: string, content: string) => Promise<void>;
  now?: () => DateTime;
  runId?: string;
}

export interface RunResult {
  runId: string;
  records: RatedBondRecord[];
  skipLog: SkipEntry[];
  stats: RunStats;
  resultsPath: string;
}

const ALLOWED_TRANSITIONS: Record<RunStage, RunStage[]> = {
  Init: ['LoadingIdentifiers'],
  LoadingIdentifiers: ['Fetching', 'Failed'],
  Fetching: ['Writing', 'Failed'],
  Writing: ['Done', 'Failed'],
  Done: [],
  Failed: []
};

/**
 * Une exécution complète : identifiants -> fiches (pool borné) -> table -> écriture atomique.
 * Les erreurs par instrument alimentent le journal des ignorés ; seules la source,
 * l'écriture et l'annulation font échouer l'exécution. Une exécution annulée n'écrit rien.
 */
export class ScrapeRun {
  readonly runId: string;
  private stage: RunStage = 'Init';
  private failedStage: RunStage | null = null;
  private readonly logger: StructuredLogger;
  private readonly stats: RunStatsTracker;
  private readonly writeFile: (targetPath: string, content: string) => Promise<void>;
  private readonly now: () => DateTime;

  constructor(private readonly deps: ScrapeRunDeps) {
    this.runId = deps.runId ?? uuidv4();
    this.logger = deps.logger.child({ component: 'scrape-run', runId: this.runId });
    this.stats = new RunStatsTracker(this.logger);
    this.writeFile = deps.writeFile ?? writeAtomically;
    this.now = deps.now ?? (() => DateTime.now().setZone(MARKET_ZONE));
  }

  getStage(): RunStage {
    return this.stage;
  }

  /** Étape en cours au moment de l'échec, null si l'exécution n'a pas échoué */
  getFailedStage(): RunStage | null {
    return this.failedStage;
  }

  getStats(): RunStats {
    return this.stats.getStats();
  }

  getSkipLog(): SkipEntry[] {
    return this.stats.getSkipLog();
  }

  async execute(signal?: AbortSignal): Promise<RunResult> {
    if (this.stage !== 'Init') {
      throw new Error(`ScrapeRun ${this.runId} already executed (stage ${this.stage})`);
    }

    try {
      this.transition('LoadingIdentifiers');
      this.logger.startTimer('load-identifiers');
      const identifiers = await this.deps.identifierSource.loadIdentifiers(signal);
      this.throwIfCancelled(signal);
      this.logger.endTimer('load-identifiers', '📋 Identifiants chargés', { count: identifiers.length });

      this.transition('Fetching');
      const records = await this.collect(identifiers, signal);

      const table = new ResultTable();
      for (const record of records) {
        if (!table.add(record)) {
          this.logger.warn('Doublon ignoré', { isin: record.isin });
        }
      }
      const rated = rateLiquidity(table.records());

      this.transition('Writing');
      await this.write(rated);

      this.transition('Done');
      this.stats.logSummary();

      return {
        runId: this.runId,
        records: rated,
        skipLog: this.stats.getSkipLog(),
        stats: this.stats.getStats(),
        resultsPath: this.deps.resultsPath
      };
    } catch (error) {
      this.fail(toError(error));
      throw error;
    }
  }

  private async collect(identifiers: string[], signal?: AbortSignal): Promise<BondRecord[]> {
    const asOf = this.now();
    this.stats.start(identifiers.length);
    this.logger.startTimer('fetching');

    const pool = new WorkerPool({ concurrency: this.deps.concurrency, signal });
    const results = await pool.run(identifiers, (isin) => this.processInstrument(isin, asOf, signal));
    this.throwIfCancelled(signal);

    this.logger.endTimer('fetching', '✅ Collecte terminée', {
      attempted: identifiers.length,
      succeeded: this.stats.getStats().succeeded
    });

    return results.filter((record): record is BondRecord => record !== null);
  }

  /**
   * Frontière par instrument : toute erreur autre que l'annulation est journalisée et ignorée
   */
  private async processInstrument(isin: string, asOf: DateTime, signal?: AbortSignal): Promise<BondRecord | null> {
    this.stats.recordAttempt();

    try {
      const payload = await this.deps.fetcher.fetchInstrument(isin, signal);
      const { record, warnings } = parseInstrument(payload, asOf);

      for (const warning of warnings) {
        this.logger.debug(warning, { isin });
      }
      this.stats.recordSuccess(warnings.length);
      return record;
    } catch (error) {
      if (error instanceof RunCancelledError || signal?.aborted) {
        throw error;
      }

      if (error instanceof FetchFailedError || error instanceof UnparseableRecordError) {
        this.logger.warn(`⏭️ ${isin} ignoré (${error.code})`, { isin, reason: error.message });
        this.stats.recordSkip(isin, error instanceof FetchFailedError ? 'FetchFailed' : 'UnparseableRecord', error.message);
        return null;
      }

      const unexpected = toError(error);
      this.logger.error(`❌ Erreur inattendue pour ${isin}`, unexpected, { isin });
      this.stats.recordSkip(isin, 'UnparseableRecord', unexpected.message);
      return null;
    }
  }

  private async write(records: RatedBondRecord[]): Promise<void> {
    const { resultsPath, skipLogPath } = this.deps;

    try {
      await this.writeFile(resultsPath, serializeResultTable(records));
    } catch (error) {
      throw error instanceof WriteFailedError
        ? error
        : new WriteFailedError(resultsPath, toError(error).message, error);
    }
    this.logger.info(`💾 ${records.length} lignes écrites`, { path: resultsPath });

    if (skipLogPath) {
      try {
        await this.writeFile(skipLogPath, serializeSkipLog(this.stats.getSkipLog()));
      } catch (error) {
        // La table est déjà publiée : le journal des ignorés n'est pas bloquant
        this.logger.warn('⚠️ Journal des ISIN ignorés non écrit', { path: skipLogPath, reason: toError(error).message });
      }
    }
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new RunCancelledError(`Run cancelled during ${this.stage}`);
    }
  }

  private transition(next: RunStage): void {
    if (!ALLOWED_TRANSITIONS[this.stage].includes(next)) {
      throw new Error(`Invalid run transition ${this.stage} -> ${next}`);
    }
    this.logger.debug(`Run stage ${this.stage} -> ${next}`);
    this.stage = next;
  }

  private fail(error: Error): void {
    if (this.stage === 'Failed' || this.stage === 'Done') return;
    this.failedStage = this.stage;
    this.stage = 'Failed';
    this.logger.error(`🛑 Exécution en échec (${this.failedStage})`, error, {
      code: error instanceof ScraperError ? error.code : 'Unknown'
    });
  }
}
