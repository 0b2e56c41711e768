import { DateTime } from 'luxon';
import { BondCategory, BondRecord, InstrumentPayload } from '../types/bond';
import { UnparseableRecordError } from '../core/errors';
import { parseLocaleNumber } from '../utils/parseLocaleNumber';
import { stripTags } from '../utils/html';
import { sameIsin } from '../utils/isin';
import { buildVolumeHistory, MARKET_ZONE, parseVolumeSeries } from './VolumeHistory';

/**
 * Libellés de la fiche instrument Borsa Italiana (segment MOT).
 * La mise en page du site évolue : seuls ces libellés sont à maintenir.
 */
export const PAGE_LABELS = {
  isin: ['Codice Isin'],
  issuer: ['Emittente'],
  category: ['Tipologia', 'Tipo Strumento'],
  coupon: ['Tasso Cedola su base Annua'],
  maturity: ['Scadenza'],
  price: ['Prezzo ufficiale'],
  yieldGross: ['Rendimento effettivo a scadenza lordo'],
  yieldNet: ['Rendimento effettivo a scadenza netto'],
  modifiedDuration: ['Duration modificata'],
  contracts: ['Numero Contratti'],
  lastVolume: ['Volume Ultimo'],
  totalVolume: ['Volume totale']
} as const;

type PageField = keyof typeof PAGE_LABELS;

export type ParsedBondPage = Omit<BondRecord, 'volumes'>;

export interface ParsedInstrument {
  record: BondRecord;
  warnings: string[];
}

const ROW_REGEX = /<tr\b[^>]*>([\s\S]*?)<\/tr>/gi;
const VALUE_SPAN_REGEX = /<span\b[^>]*class\s*=\s*"[^"]*\bt-text\b[^"]*-right\b[^"]*"[^>]*>([\s\S]*?)<\/span>/i;

export function normalizeLabel(label: string): string {
  return label.replace(/:\s*$/, '').replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Extrait les couples libellé / valeur des tableaux de la fiche :
 * une cellule libellé suivie d'un <span class="t-text -right"> contenant la valeur.
 */
export function extractLabelValues(html: string): Map<string, string> {
  const values = new Map<string, string>();
  let match: RegExpExecArray | null;

  ROW_REGEX.lastIndex = 0;
  while ((match = ROW_REGEX.exec(html)) !== null) {
    const rowHtml = match[1];
    const valueMatch = VALUE_SPAN_REGEX.exec(rowHtml);
    if (!valueMatch) continue;

    const label = normalizeLabel(stripTags(rowHtml.slice(0, valueMatch.index)));
    if (!label || values.has(label)) continue;

    values.set(label, stripTags(valueMatch[1]));
  }

  return values;
}

function lookup(values: Map<string, string>, field: PageField): string | null {
  for (const label of PAGE_LABELS[field]) {
    const value = values.get(normalizeLabel(label));
    if (value !== undefined && value !== '' && !/^-+$/.test(value)) {
      return value;
    }
  }
  return null;
}

export function mapCategory(raw: string | null): BondCategory | null {
  if (!raw) return null;
  const text = raw.toLowerCase();

  if (/sovranazional|supranational/.test(text)) return 'supranational';
  if (/stato|govern|sovereign|\bbtp\b|\bbot\b|\bcct\b|\bctz\b/.test(text)) return 'government';
  if (/corporate|societ|bancari|financial|finanziari/.test(text)) return 'corporate';
  return null;
}

/**
 * dd/MM/yy ou dd/MM/yyyy -> date. Une année sur 2 chiffres est lue en 20xx,
 * ou en 21xx si la date tombe avant `asOf` (obligations centenaires : un titre coté n'est pas échu).
 */
export function parseMaturity(raw: string | null, asOf?: DateTime): DateTime | null {
  const match = raw?.trim().match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{2}|\d{4})$/);
  if (!match) return null;

  const twoDigitYear = match[3].length === 2;
  const year = twoDigitYear ? 2000 + Number(match[3]) : Number(match[3]);
  const date = DateTime.fromObject(
    { year, month: Number(match[2]), day: Number(match[1]) },
    { zone: MARKET_ZONE }
  );
  if (!date.isValid) return null;

  if (twoDigitYear && asOf && date.toMillis() < asOf.setZone(MARKET_ZONE).startOf('day').toMillis()) {
    return date.plus({ years: 100 });
  }
  return date;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function parseBondPage(isin: string, html: string, asOf: DateTime): ParsedBondPage {
  const values = extractLabelValues(html);

  if (values.size === 0) {
    throw new UnparseableRecordError(isin, 'No label/value table found on instrument page');
  }

  const pageIsin = lookup(values, 'isin');
  if (pageIsin !== null && !sameIsin(pageIsin, isin)) {
    throw new UnparseableRecordError(isin, `Instrument page describes ${pageIsin}`);
  }
  if (pageIsin === null && !html.toUpperCase().includes(isin.toUpperCase())) {
    throw new UnparseableRecordError(isin, 'ISIN not found on instrument page');
  }

  const issuer = lookup(values, 'issuer');
  if (!issuer) {
    throw new UnparseableRecordError(isin, 'Mandatory field "issuer" not found');
  }

  const price = parseLocaleNumber(lookup(values, 'price'));
  if (price === null) {
    throw new UnparseableRecordError(isin, 'Mandatory field "price" not found');
  }

  const maturityDate = parseMaturity(lookup(values, 'maturity'), asOf);
  const startOfDay = asOf.setZone(MARKET_ZONE).startOf('day');

  return {
    isin,
    issuer,
    category: mapCategory(lookup(values, 'category')),
    coupon: parseLocaleNumber(lookup(values, 'coupon')),
    maturity: maturityDate?.toISODate() ?? null,
    price,
    yieldGross: parseLocaleNumber(lookup(values, 'yieldGross')),
    yieldNet: parseLocaleNumber(lookup(values, 'yieldNet')),
    modifiedDuration: parseLocaleNumber(lookup(values, 'modifiedDuration')),
    contracts: parseLocaleNumber(lookup(values, 'contracts')),
    lastVolume: parseLocaleNumber(lookup(values, 'lastVolume')),
    totalVolume: parseLocaleNumber(lookup(values, 'totalVolume')),
    yearsToMaturity: maturityDate
      ? round2(maturityDate.diff(startOfDay, 'days').days / 365)
      : null
  };
}

/**
 * Page + historique de volumes -> BondRecord.
 * Un historique illisible n'invalide pas la ligne : volumes vides et avertissement.
 */
export function parseInstrument(payload: InstrumentPayload, asOf: DateTime): ParsedInstrument {
  const warnings: string[] = [];
  const page = parseBondPage(payload.isin, payload.html, asOf);

  let volumes: BondRecord['volumes'] = [];
  if (payload.volumeSeries === null) {
    warnings.push('Volume history unavailable');
  } else {
    try {
      volumes = buildVolumeHistory(parseVolumeSeries(payload.volumeSeries));
    } catch (error) {
      warnings.push(`Volume history ignored: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return { record: { ...page, volumes }, warnings };
}
