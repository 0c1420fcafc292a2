import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { RateProviderError } from '../src/common/exceptions';
import { RATE_PROVIDER } from '../src/modules/exchange/providers/rate-provider.interface';
import { createMockRateProvider, MockRateProvider } from './helpers/mock-factories';

describe('Currency exchange API (e2e)', () => {
  let app: INestApplication;
  let rateProvider: MockRateProvider;

  beforeEach(async () => {
    rateProvider = createMockRateProvider();

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(RATE_PROVIDER)
      .useValue(rateProvider)
      .compile();

    app = configureApp(moduleFixture.createNestApplication());
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /api/v1 - should describe the service', async () => {
    const res = await request(app.getHttpServer()).get('/api/v1').expect(200);

    expect(res.body).toMatchObject({ message: 'Currency Exchange API', version: '1.0.0' });
  });

  describe('GET /api/v1/convert', () => {
    it('should convert and count the request', async () => {
      rateProvider.fetchRate.mockResolvedValue(1.075);

      const res = await request(app.getHttpServer())
        .get('/api/v1/convert')
        .query({ from: 'EUR', to: 'USD', amount: '100' })
        .set('X-Trace-ID', 'e2e-trace-1')
        .expect(200);

      expect(res.headers['x-trace-id']).toBe('e2e-trace-1');
      expect(res.body.conversion).toMatchObject({
        from: 'EUR',
        to: 'USD',
        amount: 100,
        convertedAmount: 107.5,
        rate: 1.075,
        traceId: 'e2e-trace-1',
      });

      const metrics = await request(app.getHttpServer()).get('/api/v1/metrics').expect(200);
      expect(metrics.headers['content-type']).toContain('text/plain');
      expect(metrics.text).toContain('http_requests_total{outcome="success"} 1');
      expect(metrics.text).toContain('currency_conversions_total 1');
      expect(metrics.text).toContain('exchange_cache_size 1');
    });

    it('should accept lower-case codes', async () => {
      rateProvider.fetchRate.mockResolvedValue(0.79);

      const res = await request(app.getHttpServer())
        .get('/api/v1/convert')
        .query({ from: 'eur', to: 'gbp', amount: '10' })
        .expect(200);

      expect(res.body.conversion).toMatchObject({ from: 'EUR', to: 'GBP', convertedAmount: 7.9 });
    });

    it('should generate a trace id when none is sent', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/v1/convert')
        .query({ from: 'USD', to: 'USD', amount: '5' })
        .expect(200);

      expect(res.headers['x-trace-id']).toMatch(/^[0-9a-f-]{36}$/);
      expect(res.body.conversion.traceId).toBe(res.headers['x-trace-id']);
    });

    it('should reject an unsupported currency with 400', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/v1/convert')
        .query({ from: 'XXX', to: 'USD', amount: '100' })
        .expect(400);

      expect(res.body).toMatchObject({ statusCode: 400, code: 'exchange.invalid_input' });
      expect(res.body.message).toContain('Unsupported currency code: XXX');
      expect(rateProvider.fetchRate).not.toHaveBeenCalled();
    });

    it('should reject a negative amount with 400', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/v1/convert')
        .query({ from: 'EUR', to: 'USD', amount: '-5' })
        .expect(400);

      expect(res.body.code).toBe('exchange.invalid_input');
    });

    it.each(['', ' ', '0x10'])('should reject amount %p with 400 without calling the provider', async (amount) => {
      rateProvider.fetchRate.mockResolvedValue(1.075);

      const res = await request(app.getHttpServer())
        .get('/api/v1/convert')
        .query({ from: 'EUR', to: 'USD', amount })
        .expect(400);

      expect(res.body.code).toBe('exchange.invalid_input');
      expect(rateProvider.fetchRate).not.toHaveBeenCalled();

      const metrics = await request(app.getHttpServer()).get('/api/v1/metrics').expect(200);
      expect(metrics.text).toContain('currency_conversions_total 0');
      expect(metrics.text).toContain('exchange_cache_size 0');
    });

    it('should reject missing parameters with 400', async () => {
      await request(app.getHttpServer()).get('/api/v1/convert').query({ from: 'EUR' }).expect(400);
    });

    it('should answer 503 when the provider fails and count the error', async () => {
      rateProvider.fetchRate.mockRejectedValue(new RateProviderError('transient', 'Rate provider responded 502'));

      const res = await request(app.getHttpServer())
        .get('/api/v1/convert')
        .query({ from: 'EUR', to: 'USD', amount: '100' })
        .expect(503);

      expect(res.body).toMatchObject({ statusCode: 503, code: 'exchange.rate_unavailable' });

      const metrics = await request(app.getHttpServer()).get('/api/v1/metrics').expect(200);
      expect(metrics.text).toContain('http_requests_total{outcome="error"} 1');
      expect(metrics.text).toContain('exchange_cache_size 0');
    });
  });

  it('GET /api/v1/currencies - should list the supported codes', async () => {
    const res = await request(app.getHttpServer()).get('/api/v1/currencies').expect(200);

    expect(res.body).toEqual({
      supportedCurrencies: ['AUD', 'BRL', 'CAD', 'CHF', 'CNY', 'EUR', 'GBP', 'INR', 'JPY', 'USD'],
      count: 10,
    });
  });

  it('POST /api/v1/cache/clear - should empty the cache', async () => {
    rateProvider.fetchRate.mockResolvedValue(1.075);
    await request(app.getHttpServer()).get('/api/v1/convert').query({ from: 'EUR', to: 'USD', amount: '1' }).expect(200);

    const first = await request(app.getHttpServer()).post('/api/v1/cache/clear').expect(200);
    const second = await request(app.getHttpServer()).post('/api/v1/cache/clear').expect(200);

    expect(first.body).toEqual({ message: 'Exchange rate cache cleared', cleared: 1 });
    expect(second.body.cleared).toBe(0);
  });

  describe('health', () => {
    it('GET /api/v1/health - should be healthy with an empty cache', async () => {
      const res = await request(app.getHttpServer()).get('/api/v1/health').expect(200);

      expect(res.body).toMatchObject({ status: 'healthy', cacheSize: 0 });
      expect(typeof res.body.timestamp).toBe('string');
    });

    it('GET /api/v1/health/live - should be ok', async () => {
      const res = await request(app.getHttpServer()).get('/api/v1/health/live').expect(200);

      expect(res.body).toEqual({ status: 'ok' });
    });

    it('GET /api/v1/health/ready - should report the rate cache up', async () => {
      const res = await request(app.getHttpServer()).get('/api/v1/health/ready').expect(200);

      expect(res.body.status).toBe('ok');
      expect(res.body.info.rate_cache).toMatchObject({ status: 'up', cacheSize: 0 });
    });
  });
});
