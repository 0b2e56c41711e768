import { BondPageFetcher, buildChartRequest } from '../../scraper/BondPageFetcher';
import { HttpClient } from '../../core/HttpClient';
import { FetchFailedError, RunCancelledError } from '../../core/errors';
import { LogLevel } from '../../core/StructuredLogger';
import { createFakeAxios, FakeHandler } from '../helpers/fakes';
import { monthlySeries, pageFor } from '../helpers/bondPage';
import { LogSink, silentLogger } from '../utils/LogSink';

const ISIN = 'IT0005534141';
const PAGE_BASE_URL = 'https://example.test/scheda';
const CHART_URL = 'https://charts.example.test/charts/services/ChartWService.asmx/GetCvals';

function fetcherFor(handler: FakeHandler, sink: LogSink = new LogSink()) {
  const fake = createFakeAxios(handler);
  const httpClient = new HttpClient('test-http', {
    timeoutMs: 1000,
    maxRetries: 0,
    baseRetryDelayMs: 0,
    maxRetryDelayMs: 0,
    userAgent: 'test-agent'
  }, silentLogger(), fake.instance);

  return {
    fetcher: new BondPageFetcher(httpClient, { pageBaseUrl: PAGE_BASE_URL, chartUrl: CHART_URL }, sink.createLogger()),
    requests: fake.requests
  };
}

describe('BondPageFetcher', () => {
  it('should build the instrument page URL', () => {
    const { fetcher } = fetcherFor(() => ({}));
    expect(fetcher.pageUrl(ISIN)).toBe('https://example.test/scheda/IT0005534141.html');
    expect(fetcher.pageUrl('XX9999 bad')).toBe('https://example.test/scheda/XX9999%20bad.html');
  });

  it('should request the monthly series of the MOT instrument', () => {
    expect(buildChartRequest(ISIN).request).toMatchObject({
      Key: 'IT0005534141.MOT',
      SampleTime: '1m',
      TimeFrame: '1y'
    });
  });

  it('should fetch the page and the volume series', async () => {
    const series = monthlySeries(2025, 1, [1000, 2000]);
    const { fetcher, requests } = fetcherFor((request) =>
      request.url === CHART_URL ? { body: JSON.stringify(series) } : { body: pageFor(ISIN) });

    const payload = await fetcher.fetchInstrument(ISIN);

    expect(payload).toEqual({ isin: ISIN, html: pageFor(ISIN), volumeSeries: series });
    expect(requests.map((request) => request.url)).toEqual([
      'https://example.test/scheda/IT0005534141.html',
      CHART_URL
    ]);
    expect(requests[1].headers.get('Origin')).toBe('https://charts.example.test');
  });

  it('should turn a page failure into FetchFailedError', async () => {
    const { fetcher, requests } = fetcherFor(() => ({ status: 404 }));

    const error = await fetcher.fetchInstrument('XX9999-bad').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchFailedError);
    expect(error).toMatchObject({
      isin: 'XX9999-bad',
      message: 'HTTP 404 for https://example.test/scheda/XX9999-bad.html'
    });
    expect(requests).toHaveLength(1);
  });

  it('should keep the page when the volume series fails', async () => {
    const sink = new LogSink();
    const { fetcher } = fetcherFor((request) =>
      request.url === CHART_URL ? { status: 500 } : { body: pageFor(ISIN) }, sink);

    const payload = await fetcher.fetchInstrument(ISIN);

    expect(payload.volumeSeries).toBeNull();
    const warnings = sink.entries(LogLevel.WARN);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ message: '⚠️ Historique de volumes indisponible', isin: ISIN });
  });

  it('should propagate cancellation', async () => {
    const controller = new AbortController();
    controller.abort();
    const { fetcher } = fetcherFor(() => ({ body: pageFor(ISIN) }));

    await expect(fetcher.fetchInstrument(ISIN, controller.signal)).rejects.toBeInstanceOf(RunCancelledError);
  });
});
