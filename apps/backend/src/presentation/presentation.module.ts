import { Module } from '@nestjs/common';
import { PricesModule } from '../prices/prices.module';
import { VisualizerService } from './visualizer.service';

@Module({
  imports: [PricesModule],
  providers: [VisualizerService],
  exports: [VisualizerService],
})
export class PresentationModule {}
