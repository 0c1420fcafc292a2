import { Module } from '@nestjs/common';
import { Registry } from 'prom-client';
import { METRICS_REGISTRY, MetricsFactory } from '../../common/services/metrics.factory';
import { RequestMetricsInterceptor } from './interceptors/request-metrics.interceptor';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';

@Module({
  controllers: [MetricsController],
  providers: [
    // One registry per application context
    { provide: METRICS_REGISTRY, useFactory: () => new Registry() },
    MetricsFactory,
    MetricsService,
    RequestMetricsInterceptor,
  ],
  exports: [MetricsService, RequestMetricsInterceptor],
})
export class MetricsModule {}
