import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { PriceSample } from './price-sample.entity';
import { PriceSummary, summarizeByAsset } from './price-stats';
import { PriceStoreService } from './price-store.service';
import { lookbackStart } from './timestamps';

@Injectable()
export class PricesService {
  constructor(
    private readonly priceStore: PriceStoreService,
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  get trackedAssets(): string[] {
    return this.configService.get('TRACKED_ASSETS', { infer: true });
  }

  async findLatest(): Promise<PriceSample[]> {
    return this.priceStore.latestPerAsset();
  }

  /** Samples of the last `hours` hours, oldest first, all assets mixed. */
  async findHistory(hours: number, now = new Date()): Promise<PriceSample[]> {
    return this.priceStore.rangeQuery(lookbackStart(hours, now));
  }

  /**
   * Per-asset statistics over the last `hours` hours. Tracked assets with no
   * sample in the window are left out.
   */
  async getSummary(hours: number, now = new Date()): Promise<PriceSummary[]> {
    const rows = await this.findHistory(hours, now);
    return summarizeByAsset(rows, this.trackedAssets);
  }
}
