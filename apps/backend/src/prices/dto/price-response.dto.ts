import { ApiProperty } from '@nestjs/swagger';
import { PriceSample } from '../price-sample.entity';
import { PriceSummary } from '../price-stats';

export class PriceSampleDto {
  @ApiProperty({ example: 'bitcoin' })
  asset: string;

  @ApiProperty({ example: 43250.12 })
  priceUsd: number;

  @ApiProperty({ example: 847000000000 })
  marketCapUsd: number;

  @ApiProperty({ example: 21000000000 })
  volumeUsd: number;

  @ApiProperty({ example: '2024-01-01 12:00:00' })
  timestamp: string;

  constructor(sample: PriceSample) {
    this.asset = sample.asset;
    this.priceUsd = sample.priceUsd;
    this.marketCapUsd = sample.marketCapUsd;
    this.volumeUsd = sample.volumeUsd;
    this.timestamp = sample.timestamp;
  }
}

export class PriceSummaryDto implements PriceSummary {
  @ApiProperty({ example: 'bitcoin' })
  asset: string;

  @ApiProperty({ example: 43250.12 })
  currentPrice: number;

  @ApiProperty({ example: 2.35, description: 'Change over the window, %' })
  percentChange: number;

  @ApiProperty({ example: 43900 })
  highestPrice: number;

  @ApiProperty({ example: 42100.5 })
  lowestPrice: number;

  @ApiProperty({ example: 21000000000 })
  averageVolume: number;

  constructor(summary: PriceSummary) {
    this.asset = summary.asset;
    this.currentPrice = summary.currentPrice;
    this.percentChange = summary.percentChange;
    this.highestPrice = summary.highestPrice;
    this.lowestPrice = summary.lowestPrice;
    this.averageVolume = summary.averageVolume;
  }
}
