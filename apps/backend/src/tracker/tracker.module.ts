import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { PricesModule } from '../prices/prices.module';
import { PriceFeedService } from './price-feed.service';
import { TrackerService } from './tracker.service';

@Module({
  imports: [
    HttpModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) => ({
        timeout: config.get('PRICE_API_TIMEOUT_MS', { infer: true }),
        maxRedirects: 3,
      }),
    }),
    PricesModule,
  ],
  providers: [PriceFeedService, TrackerService],
  exports: [PriceFeedService, TrackerService],
})
export class TrackerModule {}
