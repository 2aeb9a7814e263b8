/**
 * Centralized HTTP Client Configuration
 *
 * Shared HTTP/HTTPS agents with connection pooling and a factory for configured
 * axios instances. Requests are single-shot: there is no retry interceptor here.
 */

import axios from 'axios';
import type { AxiosInstance, CreateAxiosDefaults, InternalAxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // 5 seconds - quick API calls
  STANDARD: 30000,  // 30 seconds - standard operations
  LONG: 120000,     // 2 minutes - LLM-backed webhooks
} as const;

// Shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
});

interface TimedRequestConfig extends InternalAxiosRequestConfig {
  _startTime?: number;
  _warningTimer?: NodeJS.Timeout;
}

function clearWarningTimer(config: TimedRequestConfig | undefined): void {
  if (config?._warningTimer) {
    clearTimeout(config._warningTimer);
    config._warningTimer = undefined;
  }
}

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: CreateAxiosDefaults): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  // Warn when a request reaches 80% of its timeout
  client.interceptors.request.use((requestConfig: TimedRequestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
    }

    const timeout = requestConfig.timeout;
    const startTime = Date.now();
    requestConfig._startTime = startTime;

    const warningTimer = setTimeout(() => {
      const elapsed = Date.now() - startTime;
      logger.warn(
        {
          url: requestConfig.url,
          method: requestConfig.method,
          elapsed,
          timeout,
          percentageUsed: (elapsed / timeout) * 100,
        },
        'HTTP request approaching timeout (80% threshold)'
      );
    }, timeout * 0.8);
    warningTimer.unref();
    requestConfig._warningTimer = warningTimer;

    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      const timedConfig: TimedRequestConfig = response.config;
      clearWarningTimer(timedConfig);

      if (timedConfig._startTime) {
        logger.debug(
          {
            url: timedConfig.url,
            method: timedConfig.method,
            status: response.status,
            duration: Date.now() - timedConfig._startTime,
          },
          'HTTP request completed'
        );
      }
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        clearWarningTimer(error.config);
      }
      return Promise.reject(error);
    }
  );

  return client;
}
