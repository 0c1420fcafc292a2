import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';

// Config
import { exchangeConfig, metricsConfig, validate } from './config';

// Common
import { StructuredLoggingInterceptor } from './common/interceptors/structured-logging.interceptor';
import { LoggerModule } from './common/logger/logger.module';
import { TraceIdMiddleware } from './common/middleware/trace-id.middleware';

// Feature Modules
import { ExchangeModule } from './modules/exchange/exchange.module';
import { HealthModule } from './modules/health/health.module';
import { MetricsModule } from './modules/metrics/metrics.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [exchangeConfig, metricsConfig],
      validate,
    }),

    // Structured Logging with Winston
    LoggerModule,

    // Rate Limiting - Global: 100 requests per minute
    ThrottlerModule.forRoot([
      {
        name: 'long',
        ttl: 60000, // 1 minute
        limit: 100,
      },
    ]),

    ExchangeModule,
    MetricsModule,
    HealthModule,
  ],
  providers: [
    // Apply rate limiting globally (disabled in test environment)
    ...(process.env.NODE_ENV !== 'test'
      ? [
          {
            provide: APP_GUARD,
            useClass: ThrottlerGuard,
          },
        ]
      : []),
    {
      provide: APP_INTERCEPTOR,
      useClass: StructuredLoggingInterceptor,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(TraceIdMiddleware).forRoutes('*');
  }
}
