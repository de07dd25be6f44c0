import { SchedulerRegistry } from '@nestjs/schedule';
import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { inMemoryTypeOrmModule } from '../database/testing/sqlite-memory';
import { PriceSample } from '../prices/price-sample.entity';
import { PriceStoreService } from '../prices/price-store.service';
import { PriceQuote } from './dto/simple-price-quote.dto';
import { PriceFeedService } from './price-feed.service';
import { TRACKER_TIMEOUT, TrackerService } from './tracker.service';

// ─── Fixtures ────────────────────────────────────────────────────────────────

const QUOTES: PriceQuote[] = [
  {
    asset: 'bitcoin',
    priceUsd: 43_000,
    marketCapUsd: 840_000_000_000,
    volumeUsd: 21_000_000_000,
  },
  {
    asset: 'ethereum',
    priceUsd: 2_300,
    marketCapUsd: 276_000_000_000,
    volumeUsd: 9_000_000_000,
  },
];

// ─── Helpers ─────────────────────────────────────────────────────────────────

const flushPromises = () =>
  new Promise<void>((resolve) => setImmediate(resolve));

// ─── TrackerService ──────────────────────────────────────────────────────────

describe('TrackerService', () => {
  let module: TestingModule;
  let tracker: TrackerService;
  let store: PriceStoreService;
  let registry: SchedulerRegistry;
  let priceFeed: jest.Mocked<Pick<PriceFeedService, 'fetchQuotes'>>;
  let consoleLog: jest.SpyInstance;

  beforeEach(async () => {
    priceFeed = { fetchQuotes: jest.fn() };

    module = await Test.createTestingModule({
      imports: [
        inMemoryTypeOrmModule(),
        TypeOrmModule.forFeature([PriceSample]),
      ],
      providers: [
        TrackerService,
        PriceStoreService,
        SchedulerRegistry,
        { provide: PriceFeedService, useValue: priceFeed },
      ],
    }).compile();
    await module.init();

    tracker = module.get<TrackerService>(TrackerService);
    store = module.get<PriceStoreService>(PriceStoreService);
    registry = module.get<SchedulerRegistry>(SchedulerRegistry);
    consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    consoleLog.mockRestore();
    await module.close();
  });

  // ── persist ───────────────────────────────────────────────────────────────

  describe('persist()', () => {
    it('should store one row per quote with a shared timestamp', async () => {
      await tracker.persist(QUOTES, new Date(2024, 0, 1, 12, 0, 0));

      const rows = await store.rangeQuery('2024-01-01 00:00:00');
      expect(rows.map((row) => [row.asset, row.priceUsd, row.timestamp])).toEqual([
        ['bitcoin', 43_000, '2024-01-01 12:00:00'],
        ['ethereum', 2_300, '2024-01-01 12:00:00'],
      ]);
    });

    it('should do nothing for a failed fetch', async () => {
      expect(await tracker.persist(null)).toEqual([]);
      expect(await tracker.persist([])).toEqual([]);
      expect(await store.count()).toBe(0);
    });
  });

  // ── tick ──────────────────────────────────────────────────────────────────

  describe('tick()', () => {
    it('should store and print the fetched quotes', async () => {
      priceFeed.fetchQuotes.mockResolvedValue(QUOTES);

      await tracker.tick();

      expect(await store.count()).toBe(2);
      expect(consoleLog).toHaveBeenCalledTimes(2);
      expect(consoleLog.mock.calls[1][0]).toContain(
        'Latest stored data from database:\nBitcoin: $43,000.00 at ',
      );
    });

    it('should leave the store untouched when the fetch fails', async () => {
      priceFeed.fetchQuotes.mockResolvedValue(null);

      await expect(tracker.tick()).resolves.toBeUndefined();

      expect(await store.count()).toBe(0);
      expect(consoleLog).not.toHaveBeenCalled();
    });

    it('should skip the cycle when every fetched entry was dropped', async () => {
      priceFeed.fetchQuotes.mockResolvedValue([]);
      const insertMany = jest.spyOn(store, 'insertMany');

      await tracker.tick();

      expect(insertMany).not.toHaveBeenCalled();
      expect(consoleLog).not.toHaveBeenCalled();
    });
  });

  // ── run / stop ────────────────────────────────────────────────────────────

  describe('run()', () => {
    it('should keep running after a failed fetch until stopped', async () => {
      priceFeed.fetchQuotes.mockResolvedValue(null);

      const running = tracker.run(60);
      await flushPromises();

      expect(registry.doesExist('timeout', TRACKER_TIMEOUT)).toBe(true);
      expect(await store.count()).toBe(0);

      await tracker.stop();

      expect(registry.doesExist('timeout', TRACKER_TIMEOUT)).toBe(false);
      await expect(running).resolves.toBeUndefined();
    });

    it('should finish the iteration in flight before stopping', async () => {
      priceFeed.fetchQuotes.mockResolvedValue(QUOTES);

      const running = tracker.run(60);
      await tracker.stop();

      await expect(running).resolves.toBeUndefined();
      expect(await store.count()).toBe(2);
      expect(registry.doesExist('timeout', TRACKER_TIMEOUT)).toBe(false);
    });

    it('should reject when the store fails', async () => {
      priceFeed.fetchQuotes.mockResolvedValue(QUOTES);
      jest
        .spyOn(store, 'insertMany')
        .mockRejectedValue(new Error('SQLITE_CANTOPEN'));

      await expect(tracker.run(60)).rejects.toThrow('SQLITE_CANTOPEN');
      expect(registry.doesExist('timeout', TRACKER_TIMEOUT)).toBe(false);
    });

    it('should refuse a second concurrent run', async () => {
      priceFeed.fetchQuotes.mockResolvedValue(null);

      const running = tracker.run(60);

      await expect(tracker.run(60)).rejects.toThrow(
        'Tracker is already running',
      );
      await tracker.stop();
      await running;
    });
  });
});
