import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Query,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  ApiOperation,
  ApiQuery,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { DEFAULT_LOOKBACK_HOURS, LookbackQueryDto } from './dto/price-query.dto';
import { PriceSampleDto, PriceSummaryDto } from './dto/price-response.dto';
import { PriceSeriesError } from './price-series.errors';
import { PricesService } from './prices.service';

@ApiTags('prices')
@Controller('prices')
export class PricesController {
  constructor(private readonly pricesService: PricesService) {}

  @Get('latest')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Newest stored sample of every asset' })
  @ApiResponse({ status: 200, type: [PriceSampleDto] })
  async getLatest(): Promise<PriceSampleDto[]> {
    const samples = await this.pricesService.findLatest();
    return samples.map((sample) => new PriceSampleDto(sample));
  }

  @Get('history')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Samples of the last N hours, oldest first' })
  @ApiQuery({ name: 'hours', required: false, type: Number, example: 24 })
  @ApiResponse({ status: 200, type: [PriceSampleDto] })
  async getHistory(@Query() query: LookbackQueryDto): Promise<PriceSampleDto[]> {
    const samples = await this.pricesService.findHistory(
      query.hours ?? DEFAULT_LOOKBACK_HOURS,
    );
    return samples.map((sample) => new PriceSampleDto(sample));
  }

  @Get('summary')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Per-asset price statistics over the last N hours' })
  @ApiQuery({ name: 'hours', required: false, type: Number, example: 24 })
  @ApiResponse({ status: 200, type: [PriceSummaryDto] })
  @ApiResponse({
    status: 422,
    description: 'A window starts at a price of 0',
  })
  async getSummary(@Query() query: LookbackQueryDto): Promise<PriceSummaryDto[]> {
    try {
      const summaries = await this.pricesService.getSummary(
        query.hours ?? DEFAULT_LOOKBACK_HOURS,
      );
      return summaries.map((summary) => new PriceSummaryDto(summary));
    } catch (error) {
      if (error instanceof PriceSeriesError) {
        throw new UnprocessableEntityException(error.message);
      }
      throw error;
    }
  }
}
