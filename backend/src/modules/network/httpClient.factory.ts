/**
 * HTTP CLIENT FACTORY
 * ===================
 *
 * Creates the axios clients every upstream source uses.
 * No retry interceptor: a failed request fails its source for the cycle and
 * the next cycle tries again.
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; btc-signal-desk/1.0)';

export interface HttpClientOptions {
  baseURL: string;
  timeoutMs: number;
  proxyUrl?: string;
  headers?: Record<string, string>;
}

/**
 * Create an axios client for one upstream host.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const axiosConfig: CreateAxiosDefaults = {
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: {
      'User-Agent': DEFAULT_USER_AGENT,
      Accept: 'application/json',
      ...options.headers,
    },
  };

  if (options.proxyUrl) {
    const agent = new HttpsProxyAgent(options.proxyUrl);
    axiosConfig.httpsAgent = agent;
    axiosConfig.httpAgent = agent;
    axiosConfig.proxy = false; // the agent tunnels; axios must not proxy again
  }

  return axios.create(axiosConfig);
}
