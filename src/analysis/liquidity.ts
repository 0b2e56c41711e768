import { BondRecord, LiquidityStats, RatedBondRecord } from '../types/bond';

const MILLION = 1_000_000;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

/**
 * Percentile avec interpolation linéaire entre rangs (p dans [0, 100])
 */
export function percentile(sortedValues: number[], p: number): number {
  if (sortedValues.length === 0) {
    throw new RangeError('percentile of an empty series');
  }
  const rank = (p / 100) * (sortedValues.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sortedValues[lower] + (sortedValues[upper] - sortedValues[lower]) * (rank - lower);
}

export function volumeStats(record: BondRecord): Omit<LiquidityStats, 'liquidityRating'> {
  const volumes = record.volumes.map((point) => point.volume);
  if (volumes.length === 0) {
    return { medianMonthlyVolumeMillion: null, minMonthlyVolumeMillion: null, maxMonthlyVolumeMillion: null };
  }

  return {
    medianMonthlyVolumeMillion: round2((median(volumes) ?? 0) / MILLION),
    minMonthlyVolumeMillion: round2(Math.min(...volumes) / MILLION),
    maxMonthlyVolumeMillion: round2(Math.max(...volumes) / MILLION)
  };
}

/**
 * Note de liquidité : 0 sans volume, sinon 1 + nombre de percentiles p1..p99
 * (calculés sur les obligations échangées) strictement inférieurs à la médiane mensuelle.
 */
export function rateLiquidity(records: BondRecord[]): RatedBondRecord[] {
  const withStats = records.map((record) => ({ record, stats: volumeStats(record) }));

  const traded = withStats
    .map(({ stats }) => stats.medianMonthlyVolumeMillion)
    .filter((value): value is number => value !== null && value > 0)
    .sort((a, b) => a - b);

  const thresholds = traded.length > 0
    ? Array.from({ length: 99 }, (_, i) => percentile(traded, i + 1))
    : [];

  return withStats.map(({ record, stats }) => {
    const value = stats.medianMonthlyVolumeMillion;
    const liquidityRating = value === null || value <= 0
      ? 0
      : 1 + thresholds.filter((threshold) => threshold < value).length;

    return { ...record, ...stats, liquidityRating };
  });
}
