import { Module } from '@nestjs/common';
import { MetricsAggregatorService } from './metrics-aggregator.service';
import { NormalizerService } from './normalizer.service';

@Module({
  providers: [MetricsAggregatorService, NormalizerService],
  exports: [MetricsAggregatorService, NormalizerService],
})
export class MetricsModule {}
