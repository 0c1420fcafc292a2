import { Logger } from '@nestjs/common';
import { createExchangeConfig } from '../../../../test/helpers/mock-factories';
import { RateProviderError } from '../../../common/exceptions';
import { FrankfurterRateProvider } from './frankfurter-rate.provider';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('FrankfurterRateProvider', () => {
  let provider: FrankfurterRateProvider;
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    provider = new FrankfurterRateProvider(createExchangeConfig({ baseUrl: 'https://rates.test/' }));
    fetchSpy = jest.spyOn(global, 'fetch');
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should request the latest rate for the pair and return it', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ amount: 1, base: 'EUR', date: '2026-10-16', rates: { USD: 1.075 } }));

    await expect(provider.fetchRate('EUR', 'USD')).resolves.toBe(1.075);

    const [url] = fetchSpy.mock.calls[0];
    expect(String(url)).toBe('https://rates.test/latest?from=EUR&to=USD');
  });

  it('should pass the abort signal through to fetch', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ rates: { JPY: 161.2 } }));
    const controller = new AbortController();

    await provider.fetchRate('EUR', 'JPY', controller.signal);

    expect(fetchSpy.mock.calls[0][1]).toEqual(expect.objectContaining({ signal: controller.signal }));
  });

  it('should report an unsupported pair on HTTP 404', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ message: 'not found' }, 404));

    await expect(provider.fetchRate('EUR', 'XYZ')).rejects.toMatchObject({
      name: 'RateProviderError',
      kind: 'unsupported_pair',
    });
  });

  it('should report an unsupported pair when the rate is missing from the response', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ rates: { GBP: 0.86 } }));

    await expect(provider.fetchRate('EUR', 'USD')).rejects.toMatchObject({ kind: 'unsupported_pair' });
  });

  it('should report a transient failure on HTTP 5xx', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({}, 503));

    await expect(provider.fetchRate('EUR', 'USD')).rejects.toMatchObject({ kind: 'transient' });
  });

  it('should report a transient failure when the network call throws', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    const error = await provider.fetchRate('EUR', 'USD').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateProviderError);
    expect(error).toMatchObject({ kind: 'transient', message: 'Rate request failed: fetch failed' });
  });

  it('should report a transient failure on a body that is not JSON', async () => {
    fetchSpy.mockResolvedValue(new Response('<html>busy</html>', { status: 200 }));

    await expect(provider.fetchRate('EUR', 'USD')).rejects.toMatchObject({ kind: 'transient' });
  });

  it('should report a transient failure when rates are absent', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ error: 'maintenance' }));

    await expect(provider.fetchRate('EUR', 'USD')).rejects.toMatchObject({
      kind: 'transient',
      message: 'Provider response has no rates',
    });
  });

  it.each([0, -1, 'abc', null])('should reject the malformed rate %p', async (rate) => {
    fetchSpy.mockResolvedValue(jsonResponse({ rates: { USD: rate } }));

    await expect(provider.fetchRate('EUR', 'USD')).rejects.toMatchObject({ kind: 'transient' });
  });
});
