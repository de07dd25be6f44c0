import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { EnvironmentVariables } from '../config/env.validation';
import { PriceSummary, summarizeByAsset } from '../prices/price-stats';
import { PricesService } from '../prices/prices.service';
import {
  marketMetricsPage,
  priceComparisonPage,
  priceTrendPage,
} from './price-charts';

export interface VisualizationReport {
  files: string[];
  summaries: PriceSummary[];
}

/** Writes the static chart pages for a lookback window. */
@Injectable()
export class VisualizerService {
  private readonly logger = new Logger(VisualizerService.name);

  constructor(
    private readonly pricesService: PricesService,
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  async generate(hours: number, now = new Date()): Promise<VisualizationReport> {
    const outputDir = this.configService.get('CHART_OUTPUT_DIR', { infer: true });
    const assets = this.pricesService.trackedAssets;
    const rows = await this.pricesService.findHistory(hours, now);

    const charts: Array<[string, string]> = [
      ['price_trends.html', priceTrendPage(rows, assets, hours)],
      ['price_comparison.html', priceComparisonPage(rows, assets, hours)],
      ...assets.map((asset): [string, string] => [
        `${asset}_metrics.html`,
        marketMetricsPage(rows, asset),
      ]),
    ];

    await mkdir(outputDir, { recursive: true });
    const files: string[] = [];
    for (const [name, page] of charts) {
      const file = join(outputDir, name);
      await writeFile(file, page, 'utf8');
      this.logger.log(`Generated ${file}`);
      files.push(file);
    }

    return { files, summaries: summarizeByAsset(rows, assets) };
  }
}
