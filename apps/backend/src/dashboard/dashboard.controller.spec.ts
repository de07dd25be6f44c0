import { Test, TestingModule } from '@nestjs/testing';
import { PriceSample } from '../prices/price-sample.entity';
import { PricesService } from '../prices/prices.service';
import { refreshed, toDashboardState } from './dashboard-state';
import { DashboardController } from './dashboard.controller';

function makeSample(overrides: Partial<PriceSample> = {}): PriceSample {
  return {
    id: 1,
    asset: 'bitcoin',
    priceUsd: 43_000,
    marketCapUsd: 840_000_000_000,
    volumeUsd: 21_000_000_000,
    timestamp: '2024-01-01 12:00:00',
    ...overrides,
  };
}

// ─── DashboardState ──────────────────────────────────────────────────────────

describe('dashboard state', () => {
  it('should default to the last 24 hours and no refreshes', () => {
    expect(toDashboardState({})).toEqual({ period: '24h', refreshCount: 0 });
  });

  it('should ignore an unknown period', () => {
    expect(toDashboardState({ period: 'toString', refresh: 2 })).toEqual({
      period: '24h',
      refreshCount: 2,
    });
  });

  it('should count a refresh without touching the period', () => {
    expect(refreshed({ period: '7d', refreshCount: 3 })).toEqual({
      period: '7d',
      refreshCount: 4,
    });
  });
});

// ─── DashboardController ─────────────────────────────────────────────────────

describe('DashboardController', () => {
  let controller: DashboardController;
  let pricesService: {
    trackedAssets: string[];
    findLatest: jest.Mock;
    findHistory: jest.Mock;
  };

  beforeEach(async () => {
    pricesService = {
      trackedAssets: ['bitcoin', 'ethereum'],
      findLatest: jest.fn().mockResolvedValue([]),
      findHistory: jest.fn().mockResolvedValue([]),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [DashboardController],
      providers: [{ provide: PricesService, useValue: pricesService }],
    }).compile();

    controller = module.get<DashboardController>(DashboardController);
  });

  // ── getDashboard ──────────────────────────────────────────────────────────

  it('should read the window of the selected period once', async () => {
    await controller.getDashboard({ period: '7d' });

    expect(pricesService.findHistory).toHaveBeenCalledTimes(1);
    expect(pricesService.findHistory).toHaveBeenCalledWith(
      168,
      expect.any(Date),
    );
  });

  it('should render the latest price of each asset', async () => {
    pricesService.findLatest.mockResolvedValue([
      makeSample(),
      makeSample({ id: 2, asset: 'ethereum', priceUsd: 2_300.5 }),
    ]);

    const html = await controller.getDashboard({});

    expect(html).toContain('<span class="label">Bitcoin Price</span>');
    expect(html).toContain('<span class="value">$2,300.50</span>');
    expect(html).toContain('<h2>Price Trends - Last 24 Hours</h2>');
  });

  it('should carry the state in the page controls', async () => {
    const html = await controller.getDashboard({ period: '1h', refresh: 4 });

    expect(html).toContain('<option value="1h" selected="">Last 1 Hour</option>');
    expect(html).toContain('<input type="hidden" name="refresh" value="4"/>');
    expect(html).toContain('<input type="hidden" name="period" value="1h"/>');
    expect(html).toContain('<input type="hidden" name="refresh" value="5"/>');
  });

  it('should say so when the window is empty', async () => {
    const html = await controller.getDashboard({});

    expect(html).toContain('<p>No data available for this time period</p>');
    expect(html).toContain(
      '<p>No data available yet. Start the tracker to collect prices.</p>',
    );
    expect(html).toContain('<p class="no-data">No data</p>');
  });

  it('should chart and summarize the same rows', async () => {
    pricesService.findHistory.mockResolvedValue([
      makeSample({ priceUsd: 100, volumeUsd: 2_000 }),
      makeSample({
        id: 2,
        priceUsd: 110,
        volumeUsd: 2_000,
        timestamp: '2024-01-01 13:00:00',
      }),
    ]);

    const html = await controller.getDashboard({});

    expect(pricesService.findHistory).toHaveBeenCalledTimes(1);
    expect(html).toContain(
      '<figcaption>Cryptocurrency Prices - Last 24 Hours</figcaption>',
    );
    expect(html).toContain(
      '<tr><td>Bitcoin</td><td>$110.00</td><td>10.00%</td><td>$110.00</td><td>$100.00</td><td>$2,000.00</td></tr>',
    );
  });

  it('should still render when the window starts at a price of 0', async () => {
    pricesService.findHistory.mockResolvedValue([
      makeSample({ priceUsd: 0 }),
      makeSample({ id: 2, priceUsd: 10, timestamp: '2024-01-01 13:00:00' }),
    ]);

    const html = await controller.getDashboard({});

    expect(html).toContain(
      '<p>Summary unavailable: First price of bitcoin in the window is 0</p>',
    );
  });
});
