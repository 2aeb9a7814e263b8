/**
 * AnalysisWebhookClient - Client for the external resume analysis webhook
 *
 * Sends extracted resume text with the adjust flag and normalizes whichever
 * response shape comes back. One attempt per call: retrying would repeat a
 * costly LLM run, so callers decide whether to try again.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { createHttpClient } from '../config/httpClient.js';
import type { AnalysisClientConfig } from '../config/pipelineConfig.js';
import { UpstreamUnavailableError } from '../types/errors.js';
import type { AnalysisRequest, AnalysisResult } from '../types/resume.js';
import { normalizeAnalysisResponse } from '../services/analysis/AnalysisResponseNormalizer.js';
import { logger } from '../utils/logger.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface AnalysisClient {
  analyze(text: string, adjust: boolean): Promise<AnalysisResult>;
}

export class AnalysisWebhookClient implements AnalysisClient {
  private readonly client: AxiosInstance;

  constructor(
    private readonly config: AnalysisClientConfig,
    client?: AxiosInstance
  ) {
    this.client = client ?? createHttpClient();
  }

  /**
   * @throws UpstreamUnavailableError on connection failure, timeout or non-2xx status
   * @throws MalformedResponseError / EmptyResponseError when the body has no usable shape
   */
  async analyze(text: string, adjust: boolean): Promise<AnalysisResult> {
    const payload: AnalysisRequest = { resume_text: text, adjust };
    const { webhookUrl, timeoutMs } = this.config;

    logger.info(
      { adjust, url: webhookUrl, timeoutMs, textLength: text.length },
      'Sending resume to analysis webhook'
    );

    let data: unknown;
    try {
      const response = await this.client.post<unknown>(webhookUrl, payload, {
        timeout: timeoutMs,
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      });
      data = response.data;
    } catch (error) {
      throw this.toUpstreamError(error);
    }

    logger.debug(
      { adjust, preview: JSON.stringify(data ?? null).substring(0, 500) },
      'Analysis webhook responded'
    );

    return normalizeAnalysisResponse(data, adjust);
  }

  private toUpstreamError(error: unknown): UpstreamUnavailableError {
    const { webhookUrl, timeoutMs } = this.config;

    if (axios.isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        logger.error({ status, url: webhookUrl }, 'Analysis webhook returned an error status');
        return new UpstreamUnavailableError(
          'status',
          `Analysis service returned HTTP ${status}`,
          { statusCode: status, url: webhookUrl }
        );
      }

      if (error.code && TIMEOUT_CODES.has(error.code)) {
        logger.error({ url: webhookUrl, timeoutMs }, 'Analysis webhook timed out');
        return new UpstreamUnavailableError(
          'timeout',
          `Analysis service did not respond within ${timeoutMs / 1000}s`,
          { url: webhookUrl, timeoutMs }
        );
      }
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error, url: webhookUrl }, 'Could not reach analysis webhook');
    return new UpstreamUnavailableError(
      'connection',
      `Could not connect to the analysis service: ${message}`,
      { url: webhookUrl }
    );
  }
}
