/**
 * Shared HTTP client configuration for destination integrations.
 *
 * Every destination talks to its repository through an axios instance made
 * here, so each request carries a timeout and `export()` always returns in
 * bounded time. Status handling is left to the caller (`validateStatus`
 * accepts everything) because each API signals errors differently.
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import http from 'http';
import https from 'https';
import { logger } from '../logging/logger.js';

export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // validateConfig checks
  STANDARD: 30000,  // record uploads
} as const;

const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 2,
  timeout: 60000,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 10,
  maxFreeSockets: 2,
  timeout: 60000,
});

export type HttpClientFactory = (config: CreateAxiosDefaults) => AxiosInstance;

/**
 * Create a configured axios instance.
 *
 * @param config - Optional axios configuration merged over the defaults
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    validateStatus: () => true,
    ...config,
  });

  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
    }
    logger.debug(
      { method: requestConfig.method, baseURL: requestConfig.baseURL, url: requestConfig.url },
      'Destination HTTP request'
    );
    return requestConfig;
  });

  return client;
}

/**
 * Resolves `path` against `base` the way a browser would, treating `base`
 * as a directory even without a trailing slash.
 */
export function joinUrl(base: string, path: string): string {
  const directory = base.endsWith('/') ? base : `${base}/`;
  return new URL(path.replace(/^\//, ''), directory).toString();
}
