import { HttpClient } from '../core/HttpClient';
import { StructuredLogger } from '../core/StructuredLogger';
import { FetchFailedError, RunCancelledError } from '../core/errors';
import { InstrumentPayload } from '../types/bond';

export interface InstrumentFetcher {
  fetchInstrument(isin: string, signal?: AbortSignal): Promise<InstrumentPayload>;
}

export interface BondPageFetcherOptions {
  pageBaseUrl: string;
  chartUrl: string;
}

export function buildChartRequest(isin: string) {
  return {
    request: {
      SampleTime: '1m',
      TimeFrame: '1y',
      RequestedDataSetType: 'cvals',
      ChartPriceType: 'price',
      Key: `${isin}.MOT`,
      OffSet: 0,
      FromDate: null,
      ToDate: null,
      KeyType: 'Topic',
      KeyType2: 'Topic',
      Language: 'it-IT'
    }
  };
}

/**
 * Récupère la fiche HTML et l'historique de volumes d'un instrument.
 * Échec de la fiche = FetchFailedError, échec de l'historique = volumeSeries null.
 */
export class BondPageFetcher implements InstrumentFetcher {
  constructor(
    private readonly httpClient: HttpClient,
    private readonly options: BondPageFetcherOptions,
    private readonly logger: StructuredLogger
  ) {}

  pageUrl(isin: string): string {
    return `${this.options.pageBaseUrl}/${encodeURIComponent(isin)}.html`;
  }

  async fetchInstrument(isin: string, signal?: AbortSignal): Promise<InstrumentPayload> {
    let html: string;
    try {
      const response = await this.httpClient.getText(this.pageUrl(isin), { signal });
      html = response.data;
    } catch (error) {
      if (error instanceof RunCancelledError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchFailedError(isin, message, error);
    }

    return { isin, html, volumeSeries: await this.fetchVolumeSeries(isin, signal) };
  }

  private async fetchVolumeSeries(isin: string, signal?: AbortSignal): Promise<unknown | null> {
    try {
      const response = await this.httpClient.postJson<unknown>(this.options.chartUrl, buildChartRequest(isin), {
        signal,
        headers: {
          'Origin': new URL(this.options.chartUrl).origin,
          'Referer': `${new URL(this.options.chartUrl).origin}/charts/Bit/NVTChart.aspx?code=${encodeURIComponent(isin)}&lang=it`
        }
      });
      return response.data;
    } catch (error) {
      if (error instanceof RunCancelledError) throw error;
      this.logger.warn('⚠️ Historique de volumes indisponible', {
        isin,
        reason: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }
}
