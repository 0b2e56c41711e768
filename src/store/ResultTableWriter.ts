import { promises as fs } from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { v4 as uuidv4 } from 'uuid';
import { BondRecord, RatedBondRecord } from '../types/bond';
import { WriteFailedError } from '../core/errors';
import { SkipEntry } from '../metrics/RunStats';
import { MAX_VOLUME_MONTHS, padVolumeColumns } from '../scraper/VolumeHistory';

export const RESULT_COLUMNS: readonly string[] = [
  'isin',
  'issuer',
  'category',
  'coupon',
  'maturity',
  'price',
  'yield_gross',
  'yield_net',
  'modified_duration',
  'contracts',
  'last_volume',
  'total_volume',
  'years_to_maturity',
  'median_monthly_volume_million',
  'min_monthly_volume_million',
  'max_monthly_volume_million',
  'liquidity_rating',
  'volume_last_month',
  ...Array.from({ length: MAX_VOLUME_MONTHS }, (_, i) => `volume_month_${i + 1}`)
];

export const SKIP_LOG_COLUMNS: readonly string[] = ['isin', 'reason', 'message'];

function compareIsin(a: { isin: string }, b: { isin: string }): number {
  return a.isin < b.isin ? -1 : a.isin > b.isin ? 1 : 0;
}

/**
 * Table d'une exécution : une ligne par ISIN, triée par ISIN à la lecture
 */
export class ResultTable {
  private readonly byIsin = new Map<string, BondRecord>();

  /** false si l'ISIN est déjà présent, sans tenir compte de la casse (la première ligne est conservée) */
  add(record: BondRecord): boolean {
    const key = record.isin.toUpperCase();
    if (this.byIsin.has(key)) return false;
    this.byIsin.set(key, record);
    return true;
  }

  get size(): number {
    return this.byIsin.size;
  }

  records(): BondRecord[] {
    return [...this.byIsin.values()].sort(compareIsin);
  }
}

type Cell = string | number | null;

function toRow(record: RatedBondRecord): Cell[] {
  const lastMonth = record.volumes.length > 0 ? record.volumes[record.volumes.length - 1].month : null;

  return [
    record.isin,
    record.issuer,
    record.category,
    record.coupon,
    record.maturity,
    record.price,
    record.yieldGross,
    record.yieldNet,
    record.modifiedDuration,
    record.contracts,
    record.lastVolume,
    record.totalVolume,
    record.yearsToMaturity,
    record.medianMonthlyVolumeMillion,
    record.minMonthlyVolumeMillion,
    record.maxMonthlyVolumeMillion,
    record.liquidityRating,
    lastMonth,
    ...padVolumeColumns(record.volumes)
  ];
}

export function serializeResultTable(records: RatedBondRecord[]): string {
  const rows: Cell[][] = [[...RESULT_COLUMNS], ...[...records].sort(compareIsin).map(toRow)];
  return stringify(rows, { record_delimiter: 'unix' });
}

export function serializeSkipLog(entries: SkipEntry[]): string {
  const rows: Cell[][] = [[...SKIP_LOG_COLUMNS], ...entries.map((entry) => [entry.isin, entry.reason, entry.message])];
  return stringify(rows, { record_delimiter: 'unix' });
}

/**
 * Écriture atomique : fichier temporaire dans le même répertoire puis rename.
 * En cas d'échec le fichier précédent reste intact.
 */
export async function writeAtomically(targetPath: string, content: string): Promise<void> {
  const directory = path.dirname(path.resolve(targetPath));
  const tempPath = path.join(directory, `.${path.basename(targetPath)}.${uuidv4()}.tmp`);

  try {
    await fs.mkdir(directory, { recursive: true });
    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(content, 'utf8');
      // Contenu sur disque avant le rename, sinon une coupure peut laisser un fichier vide
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    // Nettoyage best effort, l'erreur remontée reste celle de l'écriture
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw new WriteFailedError(
      targetPath,
      `Failed to write ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}
