import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DateTime } from 'luxon';
import { ScrapeRun, ScrapeRunDeps } from '../../pipeline/ScrapeRun';
import { RunCancelledError, SourceUnavailableError, UnparseableRecordError, WriteFailedError } from '../../core/errors';
import { LogLevel } from '../../core/StructuredLogger';
import { FakeFetcher, FakeIdentifierSource, unreachableSource } from '../helpers/fakes';
import { payloadFor } from '../helpers/bondPage';
import { LogSink } from '../utils/LogSink';

const NOW = DateTime.fromISO('2025-09-15T10:00:00', { zone: 'Europe/Rome' });

describe('ScrapeRun Integration', () => {
  let dir: string;
  let resultsPath: string;
  let skipLogPath: string;
  let sink: LogSink;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scrape-run-'));
    resultsPath = path.join(dir, 'bond_info_extracted.csv');
    skipLogPath = path.join(dir, 'skipped_isins.csv');
    sink = new LogSink();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function createRun(overrides: Partial<ScrapeRunDeps>): ScrapeRun {
    return new ScrapeRun({
      identifierSource: new FakeIdentifierSource([]),
      fetcher: new FakeFetcher({}),
      logger: sink.createLogger(),
      resultsPath,
      skipLogPath,
      concurrency: 4,
      now: () => NOW,
      runId: 'run-test',
      ...overrides
    });
  }

  describe('Successful run', () => {
    it('should publish a table sorted by ISIN and a skip log', async () => {
      const fetcher = new FakeFetcher(
        {
          IT0005534141: payloadFor('IT0005534141'),
          DE0001102580: payloadFor('DE0001102580', [4_000_000])
        },
        { IT0005534141: 5, DE0001102580: 30 }
      );
      const run = createRun({
        identifierSource: new FakeIdentifierSource(['IT0005534141', 'XS2010028186', 'DE0001102580']),
        fetcher
      });

      const result = await run.execute();

      expect(result.records.map((record) => record.isin)).toEqual(['DE0001102580', 'IT0005534141']);
      expect(result.skipLog).toEqual([
        { isin: 'XS2010028186', reason: 'FetchFailed', message: 'HTTP 404 for XS2010028186' }
      ]);
      expect(result.stats).toMatchObject({ total: 3, attempted: 3, succeeded: 2, skipped: 1 });
      expect(run.getStage()).toBe('Done');
      expect(run.getFailedStage()).toBeNull();

      const lines = (await fs.readFile(resultsPath, 'utf8')).split('\n');
      expect(lines).toHaveLength(4);
      expect(lines.slice(1, 3).map((line) => line.split(',')[0])).toEqual(['DE0001102580', 'IT0005534141']);
      await expect(fs.readFile(skipLogPath, 'utf8')).resolves.toBe(
        'isin,reason,message\nXS2010028186,FetchFailed,HTTP 404 for XS2010028186\n'
      );
    });

    it('should rate liquidity across the published bonds', async () => {
      const run = createRun({
        identifierSource: new FakeIdentifierSource(['IT0000000001', 'IT0000000002', 'IT0000000003', 'IT0000000004']),
        fetcher: new FakeFetcher({
          IT0000000001: payloadFor('IT0000000001', [1_000_000]),
          IT0000000002: payloadFor('IT0000000002', [2_000_000]),
          IT0000000003: payloadFor('IT0000000003', [3_000_000]),
          IT0000000004: payloadFor('IT0000000004', [])
        })
      });

      const { records } = await run.execute();

      expect(records.map((record) => [record.isin, record.liquidityRating])).toEqual([
        ['IT0000000001', 1],
        ['IT0000000002', 50],
        ['IT0000000003', 100],
        ['IT0000000004', 0]
      ]);
    });

    it('should keep mandatory fields set and ISINs unique', async () => {
      const isins = ['IT0005534141', 'IT0005273013', 'IT0005534141'];
      const run = createRun({
        identifierSource: new FakeIdentifierSource(isins),
        fetcher: new FakeFetcher({
          IT0005534141: payloadFor('IT0005534141'),
          IT0005273013: payloadFor('IT0005273013')
        })
      });

      const { records } = await run.execute();

      expect(records.map((record) => record.isin)).toEqual(['IT0005273013', 'IT0005534141']);
      for (const record of records) {
        expect(record.isin).not.toBe('');
        expect(record.issuer).toBe('Repubblica Italiana');
        expect(record.price).toBe(101.23);
      }
    });

    it('should leave a missing coupon empty', async () => {
      const run = createRun({
        identifierSource: new FakeIdentifierSource(['IT0005534141']),
        fetcher: new FakeFetcher({
          IT0005534141: payloadFor('IT0005534141', [1_000_000], { 'Tasso Cedola su base Annua': null })
        })
      });

      const { records } = await run.execute();

      expect(records[0].coupon).toBeNull();
      const [, row] = (await fs.readFile(resultsPath, 'utf8')).split('\n');
      expect(row.split(',').slice(0, 4)).toEqual(['IT0005534141', 'Repubblica Italiana', 'government', '']);
    });

    it('should produce the same bytes when run twice', async () => {
      const instruments = {
        IT0005534141: payloadFor('IT0005534141'),
        DE0001102580: payloadFor('DE0001102580', [500_000, 750_000])
      };
      const identifiers = ['IT0005534141', 'DE0001102580', 'XS2010028186'];

      await createRun({
        identifierSource: new FakeIdentifierSource(identifiers),
        fetcher: new FakeFetcher(instruments, { IT0005534141: 20 })
      }).execute();
      const first = await fs.readFile(resultsPath);

      await createRun({
        identifierSource: new FakeIdentifierSource(identifiers),
        fetcher: new FakeFetcher(instruments, { DE0001102580: 20 })
      }).execute();
      const second = await fs.readFile(resultsPath);

      expect(second.equals(first)).toBe(true);
    });

    it('should not write a skip log when disabled', async () => {
      const run = createRun({
        identifierSource: new FakeIdentifierSource(['IT0005534141']),
        fetcher: new FakeFetcher({ IT0005534141: payloadFor('IT0005534141') }),
        skipLogPath: ''
      });

      await run.execute();

      await expect(fs.readdir(dir)).resolves.toEqual(['bond_info_extracted.csv']);
    });

    it('should refuse to execute twice', async () => {
      const run = createRun({
        identifierSource: new FakeIdentifierSource(['IT0005534141']),
        fetcher: new FakeFetcher({ IT0005534141: payloadFor('IT0005534141') })
      });

      await run.execute();

      await expect(run.execute()).rejects.toThrow('ScrapeRun run-test already executed (stage Done)');
    });
  });

  describe('Concurrency', () => {
    it('should keep the number of requests in flight within the bound', async () => {
      const isins = Array.from({ length: 10 }, (_, i) => `IT00000000${String(i).padStart(2, '0')}`);
      const instruments = Object.fromEntries(isins.map((isin) => [isin, payloadFor(isin)]));
      const delays = Object.fromEntries(isins.map((isin, i) => [isin, (i % 3) * 10 + 5]));
      const fetcher = new FakeFetcher(instruments, delays);

      const { records } = await createRun({
        identifierSource: new FakeIdentifierSource(isins),
        fetcher,
        concurrency: 3
      }).execute();

      expect(fetcher.maxInFlight).toBe(3);
      expect(fetcher.calls).toHaveLength(10);
      expect(records.map((record) => record.isin)).toEqual(isins);
    });
  });

  describe('Per-instrument failures', () => {
    it('should log exactly one WARN line per skipped instrument', async () => {
      const run = createRun({
        identifierSource: new FakeIdentifierSource(['IT0005534141', 'XX9999-bad']),
        fetcher: new FakeFetcher({ IT0005534141: payloadFor('IT0005534141') })
      });

      await run.execute();

      const warnings = sink.entries(LogLevel.WARN);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatchObject({
        message: '⏭️ XX9999-bad ignoré (FetchFailed)',
        isin: 'XX9999-bad',
        runId: 'run-test'
      });
    });

    it('should skip an unparseable page', async () => {
      const run = createRun({
        identifierSource: new FakeIdentifierSource(['IT0005534141']),
        fetcher: new FakeFetcher({
          IT0005534141: payloadFor('IT0005534141', [], { 'Prezzo ufficiale': null })
        })
      });

      const { records, skipLog } = await run.execute();

      expect(records).toEqual([]);
      expect(skipLog).toEqual([
        { isin: 'IT0005534141', reason: 'UnparseableRecord', message: 'Mandatory field "price" not found' }
      ]);
    });

    it('should skip an instrument whose fetcher fails unexpectedly', async () => {
      const run = createRun({
        identifierSource: new FakeIdentifierSource(['IT0005534141', 'IT0005273013']),
        fetcher: new FakeFetcher({
          IT0005534141: new Error('socket closed'),
          IT0005273013: new UnparseableRecordError('IT0005273013', 'No label/value table found on instrument page')
        })
      });

      const { skipLog } = await run.execute();

      expect(skipLog).toEqual([
        { isin: 'IT0005273013', reason: 'UnparseableRecord', message: 'No label/value table found on instrument page' },
        { isin: 'IT0005534141', reason: 'UnparseableRecord', message: 'socket closed' }
      ]);
      expect(sink.countByLevel(LogLevel.ERROR)).toBe(1);
    });
  });

  describe('Fatal failures', () => {
    it('should fail at LoadingIdentifiers and keep the previous table', async () => {
      await fs.writeFile(resultsPath, 'previous table\n');
      const fetcher = new FakeFetcher({});
      const run = createRun({ identifierSource: unreachableSource(), fetcher });

      await expect(run.execute()).rejects.toBeInstanceOf(SourceUnavailableError);

      expect(run.getStage()).toBe('Failed');
      expect(run.getFailedStage()).toBe('LoadingIdentifiers');
      expect(fetcher.calls).toEqual([]);
      await expect(fs.readFile(resultsPath, 'utf8')).resolves.toBe('previous table\n');
    });

    it('should fail at Writing and keep the previous table', async () => {
      await fs.writeFile(resultsPath, 'previous table\n');
      const run = createRun({
        identifierSource: new FakeIdentifierSource(['IT0005534141']),
        fetcher: new FakeFetcher({ IT0005534141: payloadFor('IT0005534141') }),
        writeFile: async () => {
          throw new Error('EACCES: permission denied');
        }
      });

      await expect(run.execute()).rejects.toThrow(new WriteFailedError(resultsPath, 'EACCES: permission denied'));

      expect(run.getFailedStage()).toBe('Writing');
      await expect(fs.readFile(resultsPath, 'utf8')).resolves.toBe('previous table\n');
    });

    it('should report a results path that cannot be replaced', async () => {
      await fs.mkdir(resultsPath);
      const run = createRun({
        identifierSource: new FakeIdentifierSource(['IT0005534141']),
        fetcher: new FakeFetcher({ IT0005534141: payloadFor('IT0005534141') })
      });

      await expect(run.execute()).rejects.toBeInstanceOf(WriteFailedError);

      expect(run.getFailedStage()).toBe('Writing');
      await expect(fs.readdir(dir)).resolves.toEqual(['bond_info_extracted.csv']);
    });

    it('should write nothing when cancelled', async () => {
      const controller = new AbortController();
      const isins = ['IT0005534141', 'IT0005273013', 'DE0001102580', 'XS2010028186'];
      const fetcher = new FakeFetcher(
        Object.fromEntries(isins.map((isin) => [isin, payloadFor(isin)])),
        {},
        (isin) => {
          if (isin === 'IT0005273013') controller.abort();
        }
      );
      const run = createRun({ identifierSource: new FakeIdentifierSource(isins), fetcher, concurrency: 1 });

      await expect(run.execute(controller.signal)).rejects.toBeInstanceOf(RunCancelledError);

      expect(run.getFailedStage()).toBe('Fetching');
      expect(fetcher.calls).toEqual(['IT0005534141', 'IT0005273013']);
      await expect(fs.readdir(dir)).resolves.toEqual([]);
    });
  });
});
