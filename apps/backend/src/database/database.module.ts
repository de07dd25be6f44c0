import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnvironmentVariables } from '../config/env.validation';
import { PriceSample } from '../prices/price-sample.entity';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) => ({
        type: 'better-sqlite3' as const,
        database: config.get<EnvironmentVariables, 'DATABASE_PATH'>('DATABASE_PATH', {
          infer: true,
        }),
        entities: [PriceSample],
        // the table is created by PriceStoreService.initialize()
        synchronize: false,
      }),
    }),
  ],
})
export class DatabaseModule {}
