import { plainToInstance, Transform } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Environment accepted by the application. Every variable has a default so a
 * bare checkout runs against CoinGecko with a local `pricewatch.db`.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  DATABASE_PATH: string = 'pricewatch.db';

  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? parseAssetList(value) : value,
  )
  @IsArray()
  @ArrayNotEmpty()
  @Matches(/^[a-z0-9-]+$/, {
    each: true,
    message: 'TRACKED_ASSETS must be a comma-separated list of asset ids',
  })
  TRACKED_ASSETS: string[] = ['bitcoin', 'ethereum'];

  @IsUrl({ require_tld: false })
  PRICE_API_URL: string = 'https://api.coingecko.com/api/v3/simple/price';

  @IsInt()
  @Min(1)
  PRICE_API_TIMEOUT_MS: number = 10000;

  @IsInt()
  @Min(1)
  POLL_INTERVAL_SECONDS: number = 60;

  @IsString()
  @IsNotEmpty()
  CHART_OUTPUT_DIR: string = '.';

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;
}

export function parseAssetList(value: string): string[] {
  return value
    .split(',')
    .map((asset) => asset.trim().toLowerCase())
    .filter((asset) => asset.length > 0);
}

export function validate(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validated;
}
