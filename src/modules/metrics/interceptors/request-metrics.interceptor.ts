import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable, tap } from 'rxjs';
import { MetricsService } from '../metrics.service';

/**
 * Counts every request through the decorated handler in `http_requests_total`,
 * labelled with whether it succeeded or failed.
 */
@Injectable()
export class RequestMetricsInterceptor implements NestInterceptor {
  constructor(private readonly metrics: MetricsService) {}

  intercept(_context: ExecutionContext, next: CallHandler): Observable<unknown> {
    return next.handle().pipe(
      tap({
        next: () => this.metrics.recordRequest('success'),
        error: () => this.metrics.recordRequest('error'),
      }),
    );
  }
}
