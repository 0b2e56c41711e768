import { DateTime } from 'luxon';
import { VolumePoint } from '../types/bond';

export const MAX_VOLUME_MONTHS = 12;
export const MARKET_ZONE = 'Europe/Rome';

export interface RawVolumePoint {
  timestamp: number;
  volume: number;
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Valide la réponse du service de graphiques : { d: [[timestampMs, volume], ...] }.
 * Les points illisibles sont ignorés, une enveloppe invalide lève une erreur.
 */
export function parseVolumeSeries(payload: unknown): RawVolumePoint[] {
  if (typeof payload !== 'object' || payload === null || !('d' in payload)) {
    throw new Error('Volume series payload has no "d" field');
  }

  const rows = payload.d;
  if (!Array.isArray(rows)) {
    throw new Error('Volume series "d" field is not an array');
  }

  const points: RawVolumePoint[] = [];
  for (const row of rows) {
    if (!Array.isArray(row) || row.length < 2) continue;
    const timestamp = toFiniteNumber(row[0]);
    const volume = toFiniteNumber(row[1]);
    if (timestamp === null || volume === null || volume < 0) continue;
    points.push({ timestamp, volume });
  }

  return points;
}

/**
 * Regroupe par mois (heure de Milan), trie du plus ancien au plus récent
 * et garde les 12 derniers mois.
 */
export function buildVolumeHistory(points: RawVolumePoint[]): VolumePoint[] {
  const byMonth = new Map<string, number>();

  for (const { timestamp, volume } of points) {
    const month = DateTime.fromMillis(timestamp, { zone: MARKET_ZONE }).toFormat('yyyy-MM');
    byMonth.set(month, (byMonth.get(month) ?? 0) + volume);
  }

  return [...byMonth.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .slice(-MAX_VOLUME_MONTHS)
    .map(([month, volume]) => ({ month, volume }));
}

/**
 * Colonnes volume_month_1..12 alignées à droite : la dernière colonne est toujours le mois le plus récent.
 */
export function padVolumeColumns(volumes: VolumePoint[]): Array<number | null> {
  const recent = volumes.slice(-MAX_VOLUME_MONTHS).map((point) => point.volume);
  const padding: Array<number | null> = new Array(MAX_VOLUME_MONTHS - recent.length).fill(null);
  return [...padding, ...recent];
}
