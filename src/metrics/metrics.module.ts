import { Module } from '@nestjs/common';
import { METRICS_CLOCK } from './config/metrics.constants';
import { MetricsController } from './metrics.controller';
import { MetricsAggregatorService } from './services/metrics-aggregator.service';
import { MetricsGeneratorService } from './services/metrics-generator.service';
import { MetricsStorageService } from './services/metrics-storage.service';
import { systemClock } from './utils/date.util';

@Module({
  controllers: [MetricsController],
  providers: [
    MetricsAggregatorService,
    MetricsGeneratorService,
    MetricsStorageService,
    { provide: METRICS_CLOCK, useValue: systemClock },
  ],
  exports: [MetricsAggregatorService, MetricsGeneratorService],
})
export class MetricsModule {}
