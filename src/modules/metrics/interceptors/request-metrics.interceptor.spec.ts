import { CallHandler, ExecutionContext } from '@nestjs/common';
import { lastValueFrom, of, throwError } from 'rxjs';
import { createMetricsService } from '../../../../test/helpers/mock-factories';
import { InvalidInputError } from '../../../common/exceptions';
import { MetricsService } from '../metrics.service';
import { RequestMetricsInterceptor } from './request-metrics.interceptor';

describe('RequestMetricsInterceptor', () => {
  let metrics: MetricsService;
  let interceptor: RequestMetricsInterceptor;
  const context = {} as ExecutionContext;

  beforeEach(() => {
    metrics = createMetricsService();
    interceptor = new RequestMetricsInterceptor(metrics);
  });

  it('should count a successful request', async () => {
    const handler: CallHandler = { handle: () => of({ conversion: {} }) };

    await lastValueFrom(interceptor.intercept(context, handler));

    expect(await metrics.getMetrics()).toContain('http_requests_total{outcome="success"} 1');
  });

  it('should count a failed request and rethrow the error', async () => {
    const error = new InvalidInputError('Unsupported currency code: XXX');
    const handler: CallHandler = { handle: () => throwError(() => error) };

    await expect(lastValueFrom(interceptor.intercept(context, handler))).rejects.toBe(error);

    expect(await metrics.getMetrics()).toContain('http_requests_total{outcome="error"} 1');
    expect((await metrics.snapshot()).requestsTotal).toBe(1);
  });
});
