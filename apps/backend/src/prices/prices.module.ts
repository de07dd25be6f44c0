import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PriceSample } from './price-sample.entity';
import { PriceStoreService } from './price-store.service';
import { PricesController } from './prices.controller';
import { PricesService } from './prices.service';

@Module({
  imports: [TypeOrmModule.forFeature([PriceSample])],
  controllers: [PricesController],
  providers: [PriceStoreService, PricesService],
  exports: [PriceStoreService, PricesService],
})
export class PricesModule {}
