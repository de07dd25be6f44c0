import { IsNumber, IsPositive, Min } from 'class-validator';

/** One asset entry of the `simple/price` response body. */
export class SimplePriceQuoteDto {
  @IsNumber()
  @IsPositive()
  usd!: number;

  @IsNumber()
  @Min(0)
  usd_market_cap!: number;

  @IsNumber()
  @Min(0)
  usd_24h_vol!: number;
}

/** A validated quote for one tracked asset. */
export interface PriceQuote {
  asset: string;
  priceUsd: number;
  marketCapUsd: number;
  volumeUsd: number;
}
