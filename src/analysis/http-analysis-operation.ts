/**
 * http-analysis-operation.ts
 * Runs analysis against a remote HTTP service
 */

import { z } from 'zod';

import { AnalysisError } from '../errors.js';
import { fetchWithTimeout } from '../utils/fetchWithTimeout.js';
import { safeJsonParse } from '../utils/json-utils.js';
import { logger } from '../utils/logger.js';

import type { AnalysisOperation, AnalysisRunOptions } from './analysis-operation.js';

const analysisResponseSchema = z.union([
  z.object({ content: z.string() }),
  z.object({ result: z.string() }),
  z.object({ message: z.object({ content: z.string() }) }),
]);

const errorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});

export interface HttpAnalysisOperationOptions {
  url: string;
  apiKey?: string;
}

/**
 * Extract a readable error from a non-2xx response body
 */
export async function parseErrorResponse(response: Response): Promise<string> {
  const statusText = `HTTP ${response.status}: ${response.statusText}`;
  try {
    const text = await response.text();
    const body = errorBodySchema.safeParse(safeJsonParse(text));
    const detail = body.success ? (body.data.error ?? body.data.message) : undefined;
    if (detail) {
      return `HTTP ${response.status}: ${detail}`;
    }
    if (text.length > 0 && text.length < 500) {
      return `HTTP ${response.status}: ${text}`;
    }
    return statusText;
  } catch (error) {
    logger.debug('Failed to read analysis error body', { error });
    return statusText;
  }
}

export class HttpAnalysisOperation implements AnalysisOperation {
  private url: string;
  private apiKey?: string;

  constructor(options: HttpAnalysisOperationOptions) {
    this.url = options.url;
    this.apiKey = options.apiKey;
  }

  async run(query: string, options: AnalysisRunOptions): Promise<string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const response = await fetchWithTimeout(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify({ query }),
      timeout: options.timeoutMs,
      signal: options.signal,
    });

    if (!response.ok) {
      throw new AnalysisError(await parseErrorResponse(response));
    }

    const body = analysisResponseSchema.safeParse(await response.json());
    if (!body.success) {
      throw new AnalysisError('Unexpected response format from analysis service');
    }

    const data = body.data;
    if ('content' in data) {
      return data.content;
    }
    if ('result' in data) {
      return data.result;
    }
    return data.message.content;
  }
}
