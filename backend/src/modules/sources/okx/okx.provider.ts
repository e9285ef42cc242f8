/**
 * OKX Derivatives Provider
 * Source: OKX v5 public REST API (no key required)
 *
 * Instrument: BTC-USDT-SWAP
 * - funding rate + last 10 settlements
 * - open interest
 * - hourly long/short account ratio
 * - filled liquidation orders
 */

import type { AxiosInstance } from 'axios';
import { errorMessage, silentLogger, type Logger } from '../../../common/logger.js';
import type {
  FetchOptions,
  FundingPayload,
  LiquidationPayload,
  LongShortPayload,
  OpenInterestPayload,
} from '../../signal/contracts/source.types.js';
import { getJson } from '../source.utils.js';
import {
  OKX_CURRENCY,
  OKX_INSTRUMENT,
  OKX_UNDERLYING,
  parseFundingHistory,
  parseFundingRate,
  parseLiquidations,
  parseLongShortRatio,
  parseOpenInterest,
} from './okx.parsers.js';

export const OKX_BASE_URL = 'https://www.okx.com';
const FUNDING_HISTORY_LIMIT = 10;

export type OkxProviderOptions = {
  http: AxiosInstance;
  logger?: Logger;
};

export class OkxProvider {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: OkxProviderOptions) {
    this.http = options.http;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Current rate is required; a failed history call only empties `recentRates`.
   */
  async fetchFunding(options: FetchOptions): Promise<FundingPayload> {
    const [current, recentRates] = await Promise.all([
      getJson(this.http, 'OKX', 'funding', '/api/v5/public/funding-rate', { instId: OKX_INSTRUMENT }, options).then(
        parseFundingRate
      ),
      getJson(
        this.http,
        'OKX',
        'funding',
        '/api/v5/public/funding-rate-history',
        { instId: OKX_INSTRUMENT, limit: FUNDING_HISTORY_LIMIT },
        options
      )
        .then(parseFundingHistory)
        .catch((err: unknown) => {
          this.logger.warn({ err: errorMessage(err) }, 'Funding history unavailable');
          return [];
        }),
    ]);

    return { ...current, recentRates };
  }

  async fetchOpenInterest(options: FetchOptions): Promise<OpenInterestPayload> {
    const data = await getJson(
      this.http,
      'OKX',
      'openInterest',
      '/api/v5/public/open-interest',
      { instType: 'SWAP', instId: OKX_INSTRUMENT },
      options
    );
    return parseOpenInterest(data);
  }

  async fetchLongShortRatio(options: FetchOptions): Promise<LongShortPayload> {
    const data = await getJson(
      this.http,
      'OKX',
      'longShortRatio',
      '/api/v5/rubik/stat/contracts/long-short-account-ratio',
      { ccy: OKX_CURRENCY, period: '1H' },
      options
    );
    return parseLongShortRatio(data);
  }

  async fetchLiquidations(options: FetchOptions): Promise<LiquidationPayload> {
    const data = await getJson(
      this.http,
      'OKX',
      'liquidations',
      '/api/v5/public/liquidation-orders',
      { instType: 'SWAP', uly: OKX_UNDERLYING, state: 'filled' },
      options
    );
    return parseLiquidations(data);
  }
}
