import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { ExchangeModule } from '../exchange/exchange.module';
import { HealthController } from './health.controller';
import { RateCacheHealthIndicator } from './indicators/rate-cache.health';
import { HealthReporterService } from './services/health-reporter.service';

@Module({
  imports: [TerminusModule, ExchangeModule],
  controllers: [HealthController],
  providers: [HealthReporterService, RateCacheHealthIndicator],
})
export class HealthModule {}
