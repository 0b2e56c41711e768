import { parse } from 'csv-parse/sync';
import { HttpClient } from '../core/HttpClient';
import { StructuredLogger } from '../core/StructuredLogger';
import { RunCancelledError, SourceUnavailableError } from '../core/errors';
import { IdentifierSourceConfig } from '../config/env';
import { isValidIsin, normalizeIsin } from '../utils/isin';

export interface IdentifierSource {
  loadIdentifiers(signal?: AbortSignal): Promise<string[]>;
}

export interface ParsedIdentifiers {
  identifiers: string[];
  /** Codes conservés qui ne passent pas le contrôle ISIN */
  malformed: string[];
  /** Lignes écartées par le filtre de devise */
  filteredOut: number;
}

export type IdentifierCsvOptions = Pick<IdentifierSourceConfig, 'delimiter' | 'isinColumn' | 'currencyColumn' | 'currency' | 'strictIsin'>;

function findColumn(header: string[], name: string): number {
  const wanted = name.trim().toLowerCase();
  return header.findIndex((column) => column.trim().toLowerCase() === wanted);
}

/**
 * Parse le listing CSV et renvoie les ISIN distincts dans l'ordre du fichier.
 * Lève SourceUnavailableError si le CSV est illisible ou sans colonne ISIN.
 */
export function parseIdentifierCsv(text: string, options: IdentifierCsvOptions): ParsedIdentifiers {
  let rows: string[][];
  try {
    rows = parse(text, {
      delimiter: options.delimiter,
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true
    });
  } catch (error) {
    throw new SourceUnavailableError(
      `Malformed identifier CSV: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  const [header, ...records] = rows;
  if (!header) {
    throw new SourceUnavailableError('Identifier CSV is empty');
  }

  const isinIndex = findColumn(header, options.isinColumn);
  if (isinIndex === -1) {
    throw new SourceUnavailableError(`Identifier CSV has no "${options.isinColumn}" column`);
  }

  const currencyIndex = options.currency ? findColumn(header, options.currencyColumn) : -1;

  const seen = new Set<string>();
  const identifiers: string[] = [];
  const malformed: string[] = [];
  let filteredOut = 0;

  for (const record of records) {
    if (currencyIndex !== -1 && (record[currencyIndex] ?? '').trim().toUpperCase() !== options.currency) {
      filteredOut++;
      continue;
    }

    // Doublons comparés sans la casse, le code est conservé tel que listé
    const isin = normalizeIsin(record[isinIndex] ?? '');
    const key = isin.toUpperCase();
    if (!isin || /\s/.test(isin) || seen.has(key)) continue;
    seen.add(key);

    if (!isValidIsin(isin)) {
      malformed.push(isin);
      if (options.strictIsin) continue;
    }

    identifiers.push(isin);
  }

  if (identifiers.length === 0) {
    throw new SourceUnavailableError('Identifier CSV contains no usable ISIN');
  }

  return { identifiers, malformed, filteredOut };
}

/**
 * Listing des obligations cotées (CSV tiers) téléchargé à chaque exécution
 */
export class ListingIdentifierSource implements IdentifierSource {
  constructor(
    private readonly httpClient: HttpClient,
    private readonly config: IdentifierSourceConfig,
    private readonly logger: StructuredLogger
  ) {}

  async loadIdentifiers(signal?: AbortSignal): Promise<string[]> {
    let text: string;
    try {
      const response = await this.httpClient.getText(this.config.url, {
        signal,
        headers: { 'Accept': 'text/csv,text/plain;q=0.9,*/*;q=0.8' }
      });
      text = response.data;
    } catch (error) {
      if (error instanceof RunCancelledError) throw error;
      throw new SourceUnavailableError(
        `Identifier source unreachable: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    const { identifiers, malformed, filteredOut } = parseIdentifierCsv(text, this.config);

    if (malformed.length > 0) {
      this.logger.warn(`⚠️ ${malformed.length} codes ne passent pas le contrôle ISIN`, {
        sample: malformed.slice(0, 5),
        dropped: this.config.strictIsin
      });
    }

    this.logger.info(`📋 ${identifiers.length} ISIN chargés`, {
      url: this.config.url,
      filteredOut,
      currency: this.config.currency || '(all)'
    });

    return identifiers;
  }
}
