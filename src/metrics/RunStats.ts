/**
 * Statistiques d'une exécution : tentés / réussis / ignorés et journal des ISIN ignorés
 */

import { SkipReason } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';

export interface SkipEntry {
  isin: string;
  reason: SkipReason;
  message: string;
}

export interface RunStats {
  startTime: Date;
  total: number;
  attempted: number;
  succeeded: number;
  skipped: number;
  skippedByReason: Record<SkipReason, number>;
  warnings: number;
  durationMs: number;
}

export class RunStatsTracker {
  private startTime: Date;
  private total: number = 0;
  private attempted: number = 0;
  private succeeded: number = 0;
  private warnings: number = 0;
  private skipLog: SkipEntry[] = [];

  constructor(
    private readonly logger: StructuredLogger,
    private readonly progressEvery: number = 100
  ) {
    this.startTime = new Date();
  }

  start(total: number): void {
    this.startTime = new Date();
    this.total = total;
  }

  recordAttempt(): void {
    this.attempted++;
  }

  recordSuccess(warningCount: number = 0): void {
    this.succeeded++;
    this.warnings += warningCount;
    this.logProgress();
  }

  recordSkip(isin: string, reason: SkipReason, message: string): void {
    this.skipLog.push({ isin, reason, message });
    this.logProgress();
  }

  /**
   * Journal trié par ISIN : indépendant de l'ordre de fin des workers
   */
  getSkipLog(): SkipEntry[] {
    return [...this.skipLog].sort((a, b) => (a.isin < b.isin ? -1 : a.isin > b.isin ? 1 : 0));
  }

  getStats(): RunStats {
    const skippedByReason: Record<SkipReason, number> = { FetchFailed: 0, UnparseableRecord: 0 };
    for (const entry of this.skipLog) {
      skippedByReason[entry.reason]++;
    }

    return {
      startTime: this.startTime,
      total: this.total,
      attempted: this.attempted,
      succeeded: this.succeeded,
      skipped: this.skipLog.length,
      skippedByReason,
      warnings: this.warnings,
      durationMs: Date.now() - this.startTime.getTime()
    };
  }

  getFormattedStats(): Record<string, string | number> {
    const stats = this.getStats();
    const minutes = Math.floor(stats.durationMs / 60000);
    const seconds = Math.floor((stats.durationMs % 60000) / 1000);

    return {
      attempted: stats.attempted,
      succeeded: stats.succeeded,
      skipped: stats.skipped,
      skipped_fetch_failed: stats.skippedByReason.FetchFailed,
      skipped_unparseable: stats.skippedByReason.UnparseableRecord,
      warnings: stats.warnings,
      duration: `${minutes}m ${seconds}s`
    };
  }

  logSummary(): void {
    this.logger.info('📊 Résumé du scraping', { component: 'runstats', ...this.getFormattedStats() });
  }

  private logProgress(): void {
    const done = this.succeeded + this.skipLog.length;
    if (this.progressEvery > 0 && done % this.progressEvery === 0) {
      this.logger.info(`⏳ ${done}/${this.total} instruments traités`, {
        component: 'runstats',
        succeeded: this.succeeded,
        skipped: this.skipLog.length
      });
    }
  }
}
