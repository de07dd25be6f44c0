import { Module } from '@nestjs/common';
import { PricesModule } from '../prices/prices.module';
import { DashboardController } from './dashboard.controller';

@Module({
  imports: [PricesModule],
  controllers: [DashboardController],
})
export class DashboardModule {}
