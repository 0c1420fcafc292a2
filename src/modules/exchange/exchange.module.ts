import { Module, OnModuleInit } from '@nestjs/common';
import { MetricsModule } from '../metrics/metrics.module';
import { MetricsService } from '../metrics/metrics.service';
import { ExchangeController } from './controllers/exchange.controller';
import { FrankfurterRateProvider } from './providers/frankfurter-rate.provider';
import { RATE_PROVIDER } from './providers/rate-provider.interface';
import { ConversionService } from './services/conversion.service';
import { RateCacheService } from './services/rate-cache.service';

@Module({
  imports: [MetricsModule],
  controllers: [ExchangeController],
  providers: [
    RateCacheService,
    ConversionService,
    FrankfurterRateProvider,
    { provide: RATE_PROVIDER, useExisting: FrankfurterRateProvider },
  ],
  exports: [RateCacheService, ConversionService],
})
export class ExchangeModule implements OnModuleInit {
  constructor(
    private readonly rateCache: RateCacheService,
    private readonly metrics: MetricsService,
  ) {}

  onModuleInit(): void {
    this.metrics.observeCacheSize(() => this.rateCache.size());
  }
}
