import { describe, it, expect } from 'vitest';
import {
  parseFundingHistory,
  parseFundingRate,
  parseLiquidations,
  parseLongShortRatio,
  parseOpenInterest,
} from '../okx/okx.parsers.js';
import { FetchError } from '../../signal/contracts/fetch.error.js';

const envelope = (data: unknown[]) => ({ code: '0', msg: '', data });

describe('OKX parsers', () => {
  describe('funding', () => {
    it('reads the current rate', () => {
      const data = envelope([{ instId: 'BTC-USDT-SWAP', fundingRate: '0.00012', fundingTime: '1700000000000' }]);
      expect(parseFundingRate(data)).toEqual({
        instrument: 'BTC-USDT-SWAP',
        currentRate: 0.00012,
        nextFundingTime: 1700000000000,
      });
    });

    it('reads past settlements', () => {
      const data = envelope([
        { fundingRate: '0.0001', fundingTime: '1699971200000' },
        { fundingRate: '-0.00005', fundingTime: '1699942400000' },
      ]);
      expect(parseFundingHistory(data)).toEqual([
        { rate: 0.0001, time: 1699971200000 },
        { rate: -0.00005, time: 1699942400000 },
      ]);
    });

    it('fails UPSTREAM on a non-zero code', () => {
      const fn = () => parseFundingRate({ code: '50011', msg: 'Too Many Requests', data: [] });
      expect(fn).toThrow(FetchError);
      expect(fn).toThrow('OKX error 50011: Too Many Requests');
    });

    it('fails UPSTREAM on empty data', () => {
      expect(() => parseFundingRate(envelope([]))).toThrow('OKX returned no data');
    });

    it('fails MALFORMED on a non-numeric rate', () => {
      const data = envelope([{ instId: 'BTC-USDT-SWAP', fundingRate: 'n/a' }]);
      expect(() => parseFundingRate(data)).toThrow(/^Unexpected funding payload \(data\.0\.fundingRate: /);
    });
  });

  it('reads open interest in contracts and BTC', () => {
    const data = envelope([{ instId: 'BTC-USDT-SWAP', oi: '2500000', oiCcy: '25000', ts: '1700000000000' }]);
    expect(parseOpenInterest(data)).toEqual({
      instrument: 'BTC-USDT-SWAP',
      contracts: 2_500_000,
      btc: 25_000,
      timestamp: 1700000000000,
    });
  });

  it('takes the newest long/short row as current', () => {
    const data = envelope([
      ['1700003600000', '1.8'],
      ['1700000000000', '1.6'],
    ]);
    expect(parseLongShortRatio(data)).toEqual({
      currency: 'BTC',
      currentRatio: 1.8,
      history: [
        { timestamp: 1700003600000, ratio: 1.8 },
        { timestamp: 1700000000000, ratio: 1.6 },
      ],
    });
  });

  it('keeps at most 12 long/short points', () => {
    const rows = Array.from({ length: 20 }, (_, i) => [String(20 - i), '1.1']);
    expect(parseLongShortRatio(envelope(rows)).history).toHaveLength(12);
  });

  describe('liquidations', () => {
    const data = envelope([
      {
        details: [
          { bkPx: '50000', sz: '100', posSide: 'long', ts: '3' },
          { bkPx: '50500', sz: '20', posSide: 'short', ts: '5' },
        ],
      },
      {
        details: [{ bkPx: '49000', sz: '10', posSide: 'net', ts: '4' }],
      },
    ]);

    it('converts contracts to BTC and sums USD per side', () => {
      const payload = parseLiquidations(data);
      expect(payload.longUsd).toBeCloseTo(50_000, 6);
      expect(payload.shortUsd).toBeCloseTo(10_100, 6);
      expect(payload.totalUsd).toBeCloseTo(60_100, 6);
      expect(payload.longCount).toBe(1);
      expect(payload.shortCount).toBe(1);
    });

    it('lists events newest first, unknown sides included', () => {
      const events = parseLiquidations(data).recentEvents;
      expect(events.map((e) => e.time)).toEqual([5, 4, 3]);
      expect(events[1]).toMatchObject({ side: 'unknown', price: 49_000 });
      expect(events[1].sizeBtc).toBeCloseTo(0.1, 10);
    });

    it('treats an empty tape as zero', () => {
      expect(parseLiquidations(envelope([]))).toEqual({
        longUsd: 0,
        shortUsd: 0,
        longCount: 0,
        shortCount: 0,
        totalUsd: 0,
        recentEvents: [],
      });
    });
  });
});
