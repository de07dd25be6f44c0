import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export const DEFAULT_LOOKBACK_HOURS = 24;

export class LookbackQueryDto {
  @ApiPropertyOptional({
    description: 'Size of the window ending now, in hours',
    example: DEFAULT_LOOKBACK_HOURS,
    minimum: 1,
    maximum: 8760,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(8760)
  hours?: number;
}
