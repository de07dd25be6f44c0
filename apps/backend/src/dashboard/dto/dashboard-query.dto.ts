import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Min } from 'class-validator';
import { DASHBOARD_PERIOD_KEYS, DashboardPeriod } from '../dashboard-state';

export class DashboardQueryDto {
  @ApiPropertyOptional({ enum: [...DASHBOARD_PERIOD_KEYS], example: '24h' })
  @IsOptional()
  @IsIn([...DASHBOARD_PERIOD_KEYS])
  period?: DashboardPeriod;

  @ApiPropertyOptional({ description: 'Times the page has been refreshed' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  refresh?: number;
}
