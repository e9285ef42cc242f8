import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import { toFetchError } from '../http.errors.js';
import { createHttpClient, DEFAULT_USER_AGENT } from '../httpClient.factory.js';
import { RATE_LIMITS, getRateLimiter } from '../rateLimiter.js';
import { FetchError } from '../../signal/contracts/fetch.error.js';

const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };

describe('toFetchError', () => {
  it('passes a FetchError through', () => {
    const original = new FetchError('MALFORMED', 'news', 'bad payload');
    expect(toFetchError('news', original)).toBe(original);
  });

  it.each(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED'])('maps %s to TIMEOUT', (code) => {
    const err = toFetchError('price', new AxiosError('timeout of 1000ms exceeded', code, config));
    expect(err.kind).toBe('TIMEOUT');
    expect(err.message).toBe('timeout of 1000ms exceeded');
  });

  it('maps an HTTP error response to UPSTREAM', () => {
    const err = toFetchError(
      'funding',
      new AxiosError('Request failed with status code 429', 'ERR_BAD_REQUEST', config, null, {
        data: {},
        status: 429,
        statusText: 'Too Many Requests',
        headers: {},
        config,
      })
    );
    expect(err).toMatchObject({ kind: 'UPSTREAM', source: 'funding', message: 'HTTP 429 from funding' });
  });

  it('maps a connection failure to TRANSPORT', () => {
    const err = toFetchError('orderBook', new AxiosError('getaddrinfo ENOTFOUND api.kraken.com', 'ENOTFOUND', config));
    expect(err).toMatchObject({ kind: 'TRANSPORT', message: 'getaddrinfo ENOTFOUND api.kraken.com' });
  });

  it('maps anything else to TRANSPORT', () => {
    expect(toFetchError('news', 'socket closed')).toMatchObject({ kind: 'TRANSPORT', message: 'socket closed' });
  });
});

describe('createHttpClient', () => {
  it('sets base URL, timeout and identifying headers', () => {
    const http = createHttpClient({ baseURL: 'https://api.kraken.com', timeoutMs: 2_500 });
    expect(http.defaults.baseURL).toBe('https://api.kraken.com');
    expect(http.defaults.timeout).toBe(2_500);
    expect(http.defaults.headers['User-Agent']).toBe(DEFAULT_USER_AGENT);
    expect(http.defaults.proxy).toBeUndefined();
  });

  it('tunnels through the proxy agent when configured', () => {
    const http = createHttpClient({
      baseURL: 'https://www.okx.com',
      timeoutMs: 2_500,
      proxyUrl: 'http://proxy.test:8080',
    });
    expect(http.defaults.proxy).toBe(false);
    expect(http.defaults.httpsAgent).toBeDefined();
  });
});

describe('getRateLimiter', () => {
  it('shares one limiter per provider', () => {
    expect(getRateLimiter('OKX')).toBe(getRateLimiter('OKX'));
    expect(getRateLimiter('OKX')).not.toBe(getRateLimiter('KRAKEN'));
  });

  it('paces OKX for four sources per cycle', () => {
    expect(RATE_LIMITS.OKX).toEqual({ minTime: 100, maxConcurrent: 4 });
  });
});
