/**
 * Error types and failure handling shared by the pipeline, the CLI and the HTTP layer
 */

import axios from 'axios';
import { PipelineLogger } from './LoggerUtils.js';

export class PipelineInputError extends Error {
  readonly statusCode: number = 400;

  constructor(message: string) {
    super(message);
    this.name = 'PipelineInputError';
  }
}

export class InputNotFoundError extends PipelineInputError {
  constructor(readonly inputPath: string) {
    super(`input not found: ${inputPath}`);
    this.name = 'InputNotFoundError';
  }
}

export class OcrServiceError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'OcrServiceError';
  }
}

export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface ErrorInfo {
  isRateLimit: boolean;
  isAuthError: boolean;
  isServerError: boolean;
  isNetworkError: boolean;
  retryable: boolean;
  status?: number;
}

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  context?: string;
}

const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN', 'EPIPE']);

export class ErrorHandler {
  /**
   * Classify a failure from an external service call.
   * Status codes come from axios responses or a `status` property (OpenAI SDK, OcrServiceError).
   */
  static analyzeError(error: unknown): ErrorInfo {
    const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
    let status: number | undefined;
    let code: string | undefined;

    if (axios.isAxiosError(error)) {
      status = error.response?.status;
      code = error.code;
    } else if (error instanceof OcrServiceError) {
      status = error.status;
    } else if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
      status = error.status;
    }

    const isRateLimit = status === 429 ||
      message.includes('rate limit') ||
      message.includes('too many requests');

    const isAuthError = status === 401 || status === 403;

    const isServerError = status === 502 || status === 503 || status === 504;

    const isNetworkError = (code !== undefined && NETWORK_CODES.has(code)) ||
      message.includes('socket hang up') ||
      message.includes('timeout') ||
      message.includes('econnreset');

    return {
      isRateLimit,
      isAuthError,
      isServerError,
      isNetworkError,
      retryable: !isAuthError && (isRateLimit || isServerError || isNetworkError),
      status
    };
  }

  static getLogMessage(error: unknown, context: string): string {
    const info = this.analyzeError(error);

    if (info.isRateLimit) {
      return `Rate limit hit in ${context}`;
    } else if (info.isAuthError) {
      return `Authentication failed in ${context}`;
    } else if (info.isServerError) {
      return `Upstream service unavailable in ${context} (HTTP ${info.status})`;
    } else if (info.isNetworkError) {
      return `Network issue in ${context}`;
    }
    return `${context} failed`;
  }

  /**
   * Run an operation, retrying retryable failures with exponential backoff and jitter.
   */
  static async withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const { retries = 2, initialDelayMs = 1000, context = 'operation' } = options;
    let attempt = 0;

    while (true) {
      try {
        return await operation();
      } catch (error) {
        attempt++;
        if (attempt > retries || !this.analyzeError(error).retryable) {
          throw error;
        }

        const backoff = initialDelayMs * Math.pow(2, attempt - 1);
        const jitter = Math.random() * Math.min(1000, initialDelayMs);
        const delay = Math.round(backoff + jitter);

        PipelineLogger.warn('RETRY', `${this.getLogMessage(error, context)}; attempt ${attempt}/${retries}, retrying in ${delay}ms`);
        await new Promise(resolve => setTimeout(resolve, delay));
      }
    }
  }

  /** HTTP status for a pipeline failure: caller mistakes are 400, everything else 500. */
  static getHttpStatus(error: unknown): number {
    if (error instanceof PipelineInputError) {
      return error.statusCode;
    }
    return 500;
  }

  static getMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
