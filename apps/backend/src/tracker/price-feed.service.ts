import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AxiosResponse } from 'axios';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { firstValueFrom } from 'rxjs';
import { EnvironmentVariables } from '../config/env.validation';
import { PriceQuote, SimplePriceQuoteDto } from './dto/simple-price-quote.dto';

type SimplePriceResponse = Record<string, unknown>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class PriceFeedService {
  private readonly logger = new Logger(PriceFeedService.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService<EnvironmentVariables, true>,
  ) {}

  get trackedAssets(): string[] {
    return this.configService.get('TRACKED_ASSETS', { infer: true });
  }

  /**
   * Current USD price, market cap and 24h volume of every tracked asset.
   * Resolves to null when the request fails or the body is not an object;
   * the failure is logged and never thrown.
   */
  async fetchQuotes(): Promise<PriceQuote[] | null> {
    const assets = this.trackedAssets;
    let body: unknown;

    try {
      const response = await firstValueFrom<AxiosResponse<SimplePriceResponse>>(
        this.httpService.get<SimplePriceResponse>(
          this.configService.get('PRICE_API_URL', { infer: true }),
          {
            params: {
              ids: assets.join(','),
              vs_currencies: 'usd',
              include_market_cap: 'true',
              include_24hr_vol: 'true',
            },
          },
        ),
      );
      body = response.data;
    } catch (error) {
      this.logger.error(`Error fetching data: ${describeError(error)}`);
      return null;
    }

    if (!isRecord(body)) {
      this.logger.error('Error fetching data: response body is not an object');
      return null;
    }
    const quotes = body;
    return assets.flatMap((asset) => this.parseQuote(asset, quotes[asset]));
  }

  private parseQuote(asset: string, entry: unknown): PriceQuote[] {
    if (entry === undefined) {
      this.logger.warn(`No quote returned for ${asset}`);
      return [];
    }
    if (!isRecord(entry)) {
      this.logger.warn(`Skipping malformed quote for ${asset}`);
      return [];
    }
    const quote = plainToInstance(SimplePriceQuoteDto, entry);

    if (validateSync(quote).length > 0) {
      this.logger.warn(`Skipping malformed quote for ${asset}`);
      return [];
    }
    return [
      {
        asset,
        priceUsd: quote.usd,
        marketCapUsd: quote.usd_market_cap,
        volumeUsd: quote.usd_24h_vol,
      },
    ];
  }
}
