import axios, { AxiosAdapter, AxiosError, AxiosHeaders, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { InstrumentFetcher } from '../../scraper/BondPageFetcher';
import { IdentifierSource } from '../../sources/IdentifierSource';
import { FetchFailedError, SourceUnavailableError } from '../../core/errors';
import { InstrumentPayload } from '../../types/bond';

export interface FakeResponse {
  status?: number;
  body?: string | Buffer;
  headers?: Record<string, string>;
  error?: 'timeout' | 'network';
}

export type FakeHandler = (request: InternalAxiosRequestConfig) => FakeResponse;

export interface FakeAxios {
  instance: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

/**
 * Instance axios dont l'adapter répond en mémoire (aucun accès réseau)
 */
export function createFakeAxios(handler: FakeHandler): FakeAxios {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const response = handler(config);

    if (response.error === 'timeout') {
      throw new AxiosError(`timeout of ${config.timeout}ms exceeded`, 'ECONNABORTED', config);
    }
    if (response.error === 'network') {
      throw new AxiosError('socket hang up', 'ECONNRESET', config);
    }

    const body = response.body ?? '';
    return {
      data: Buffer.isBuffer(body) ? body : Buffer.from(body, 'utf8'),
      status: response.status ?? 200,
      statusText: '',
      headers: new AxiosHeaders(response.headers ?? {}),
      config
    };
  };

  return { instance: axios.create({ adapter }), requests };
}

export class FakeIdentifierSource implements IdentifierSource {
  calls = 0;

  constructor(private readonly result: string[] | Error) {}

  async loadIdentifiers(): Promise<string[]> {
    this.calls++;
    if (this.result instanceof Error) throw this.result;
    return [...this.result];
  }
}

export const unreachableSource = (): FakeIdentifierSource =>
  new FakeIdentifierSource(new SourceUnavailableError('Identifier source unreachable: ECONNREFUSED'));

export type FakeInstrument = InstrumentPayload | Error;

/**
 * Fetcher en mémoire : un payload (ou une erreur) par ISIN, délai optionnel
 */
export class FakeFetcher implements InstrumentFetcher {
  readonly calls: string[] = [];
  private inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly instruments: Record<string, FakeInstrument>,
    private readonly delays: Record<string, number> = {},
    private readonly onFetch?: (isin: string) => void
  ) {}

  async fetchInstrument(isin: string): Promise<InstrumentPayload> {
    this.calls.push(isin);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      this.onFetch?.(isin);
      const delay = this.delays[isin] ?? 0;
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }

      const instrument = this.instruments[isin];
      if (instrument === undefined) {
        throw new FetchFailedError(isin, `HTTP 404 for ${isin}`);
      }
      if (instrument instanceof Error) {
        throw instrument;
      }
      return instrument;
    } finally {
      this.inFlight--;
    }
  }
}
