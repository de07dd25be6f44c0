import { Controller, Get, Header, Query, Redirect } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiTags } from '@nestjs/swagger';
import { PriceSeriesError } from '../prices/price-series.errors';
import { PriceSummary, summarizeByAsset } from '../prices/price-stats';
import { PricesService } from '../prices/prices.service';
import { DASHBOARD_PERIODS, toDashboardState } from './dashboard-state';
import { renderDashboard } from './dashboard.view';
import { DashboardQueryDto } from './dto/dashboard-query.dto';

@ApiTags('dashboard')
@Controller()
export class DashboardController {
  constructor(private readonly pricesService: PricesService) {}

  @Get()
  @Redirect('/dashboard')
  root(): void {}

  @Get('dashboard')
  @Header('Content-Type', 'text/html; charset=utf-8')
  @ApiOperation({ summary: 'Interactive price dashboard' })
  @ApiProduces('text/html')
  async getDashboard(@Query() query: DashboardQueryDto): Promise<string> {
    const state = toDashboardState(query);
    const { hours } = DASHBOARD_PERIODS[state.period];
    const now = new Date();

    const [latest, history] = await Promise.all([
      this.pricesService.findLatest(),
      this.pricesService.findHistory(hours, now),
    ]);

    // charts and summary read the same rows
    let summaries: PriceSummary[] = [];
    let summaryError: string | undefined;
    try {
      summaries = summarizeByAsset(history, this.pricesService.trackedAssets);
    } catch (error) {
      if (!(error instanceof PriceSeriesError)) {
        throw error;
      }
      summaryError = error.message;
    }

    return renderDashboard({
      state,
      assets: this.pricesService.trackedAssets,
      latest,
      history,
      summaries,
      summaryError,
      renderedAt: now,
    });
  }
}
