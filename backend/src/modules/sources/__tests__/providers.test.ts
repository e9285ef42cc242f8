import { describe, it, expect, vi } from 'vitest';
import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { KrakenProvider } from '../kraken/kraken.provider.js';
import { OkxProvider } from '../okx/okx.provider.js';
import { FetchError } from '../../signal/contracts/fetch.error.js';

type Route = (config: InternalAxiosRequestConfig) => unknown;

/**
 * In-process axios transport: answers by request path, 404 otherwise.
 */
function fakeHttp(routes: Record<string, Route>) {
  const adapter: AxiosAdapter = async (config) => {
    const route = config.url ? routes[config.url] : undefined;
    if (!route) {
      throw new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', config, null, {
        data: {},
        status: 404,
        statusText: 'Not Found',
        headers: {},
        config,
      });
    }
    return { data: route(config), status: 200, statusText: 'OK', headers: {}, config };
  };
  return axios.create({ baseURL: 'https://upstream.test', adapter });
}

const options = () => ({ signal: new AbortController().signal, timeoutMs: 1_000 });

describe('KrakenProvider', () => {
  it('fetches the last price with the BTC/USD pair', async () => {
    const ticker = vi.fn((config: InternalAxiosRequestConfig) => {
      expect(config.params).toEqual({ pair: 'XBTUSD' });
      return { error: [], result: { XXBTZUSD: { c: ['97000.5', '0.1'] } } };
    });
    const provider = new KrakenProvider({ http: fakeHttp({ '/0/public/Ticker': ticker }) });

    await expect(provider.fetchPrice(options())).resolves.toEqual({ symbol: 'BTC/USD', price: 97000.5 });
    expect(ticker).toHaveBeenCalledTimes(1);
  });

  it('reduces the depth snapshot to wall strength', async () => {
    const provider = new KrakenProvider({
      http: fakeHttp({
        '/0/public/Depth': () => ({
          error: [],
          result: {
            XXBTZUSD: {
              bids: [['100', '2', 1], ['99.5', '3', 1], ['98', '10', 1]],
              asks: [['101', '1', 1], ['101.5', '1.5', 1], ['103', '20', 1]],
            },
          },
        }),
      }),
    });

    const wall = await provider.fetchOrderBook(options());
    expect(wall.bidWallVolume).toBe(5);
    expect(wall.askWallVolume).toBe(2.5);
    expect(wall.wallRatio).toBe(2);
  });

  it('maps an HTTP error to an UPSTREAM FetchError', async () => {
    const provider = new KrakenProvider({ http: fakeHttp({}) });
    const err = await provider.fetchPrice(options()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ kind: 'UPSTREAM', source: 'price', message: 'HTTP 404 from price' });
  });
});

describe('OkxProvider', () => {
  const fundingRate = () => ({
    code: '0',
    data: [{ instId: 'BTC-USDT-SWAP', fundingRate: '0.0002', fundingTime: '1700000000000' }],
  });

  it('joins the current rate with recent settlements', async () => {
    const provider = new OkxProvider({
      http: fakeHttp({
        '/api/v5/public/funding-rate': fundingRate,
        '/api/v5/public/funding-rate-history': () => ({
          code: '0',
          data: [{ fundingRate: '0.0001', fundingTime: '1699971200000' }],
        }),
      }),
    });

    await expect(provider.fetchFunding(options())).resolves.toEqual({
      instrument: 'BTC-USDT-SWAP',
      currentRate: 0.0002,
      nextFundingTime: 1700000000000,
      recentRates: [{ rate: 0.0001, time: 1699971200000 }],
    });
  });

  it('tolerates a failed history call', async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const provider = new OkxProvider({
      http: fakeHttp({ '/api/v5/public/funding-rate': fundingRate }),
      logger,
    });

    const funding = await provider.fetchFunding(options());

    expect(funding.currentRate).toBe(0.0002);
    expect(funding.recentRates).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith({ err: 'HTTP 404 from funding' }, 'Funding history unavailable');
  });

  it('fails the source when the current rate is unavailable', async () => {
    const provider = new OkxProvider({
      http: fakeHttp({
        '/api/v5/public/funding-rate': () => ({ code: '50011', msg: 'Too Many Requests', data: [] }),
        '/api/v5/public/funding-rate-history': () => ({ code: '0', data: [] }),
      }),
    });

    await expect(provider.fetchFunding(options())).rejects.toMatchObject({
      kind: 'UPSTREAM',
      source: 'funding',
      message: 'OKX error 50011: Too Many Requests',
    });
  });

  it('queries liquidations for filled swap orders', async () => {
    const route = vi.fn((config: InternalAxiosRequestConfig) => {
      expect(config.params).toEqual({ instType: 'SWAP', uly: 'BTC-USDT', state: 'filled' });
      return { code: '0', data: [{ details: [{ bkPx: '60000', sz: '50', posSide: 'short', ts: '1' }] }] };
    });
    const provider = new OkxProvider({ http: fakeHttp({ '/api/v5/public/liquidation-orders': route }) });

    const liquidations = await provider.fetchLiquidations(options());
    expect(liquidations.shortUsd).toBeCloseTo(30_000, 6);
    expect(liquidations.shortCount).toBe(1);
  });
});
