import { describe, it, expect, vi } from 'vitest';
import {
  ErrorHandler,
  InputNotFoundError,
  OcrServiceError,
  PipelineInputError
} from '../utils/errorHandler.js';

describe('ErrorHandler.analyzeError', () => {
  it('treats 503 from the OCR service as retryable', () => {
    const info = ErrorHandler.analyzeError(new OcrServiceError('busy', 503));
    expect(info.isServerError).toBe(true);
    expect(info.retryable).toBe(true);
    expect(info.status).toBe(503);
  });

  it('never retries authentication failures', () => {
    const info = ErrorHandler.analyzeError(new OcrServiceError('denied', 401));
    expect(info.isAuthError).toBe(true);
    expect(info.retryable).toBe(false);
  });

  it('reads a status property from SDK errors', () => {
    const info = ErrorHandler.analyzeError({ status: 429 });
    expect(info.isRateLimit).toBe(true);
    expect(info.retryable).toBe(true);
  });

  it('recognises network failures from the message', () => {
    expect(ErrorHandler.analyzeError(new Error('socket hang up')).isNetworkError).toBe(true);
    expect(ErrorHandler.analyzeError(new Error('bad input')).retryable).toBe(false);
  });
});

describe('ErrorHandler.withRetry', () => {
  it('retries a retryable failure and returns the later result', async () => {
    const operation = vi.fn()
      .mockRejectedValueOnce(new OcrServiceError('busy', 503))
      .mockResolvedValueOnce('ok');

    await expect(ErrorHandler.withRetry(operation, { retries: 2, initialDelayMs: 1 })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('gives up once retries are exhausted', async () => {
    const operation = vi.fn().mockRejectedValue(new OcrServiceError('busy', 503));

    await expect(ErrorHandler.withRetry(operation, { retries: 1, initialDelayMs: 1 })).rejects.toThrow('busy');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('rethrows non-retryable failures immediately', async () => {
    const operation = vi.fn().mockRejectedValue(new PipelineInputError('no valid inputs'));

    await expect(ErrorHandler.withRetry(operation, { retries: 3, initialDelayMs: 1 })).rejects.toThrow('no valid inputs');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('ErrorHandler.getHttpStatus', () => {
  it('maps input errors to 400 and everything else to 500', () => {
    expect(ErrorHandler.getHttpStatus(new InputNotFoundError('missing.png'))).toBe(400);
    expect(ErrorHandler.getHttpStatus(new PipelineInputError('unsupported file type'))).toBe(400);
    expect(ErrorHandler.getHttpStatus(new OcrServiceError('down', 502))).toBe(500);
    expect(ErrorHandler.getHttpStatus(new Error('boom'))).toBe(500);
  });

  it('describes a missing input by path', () => {
    expect(new InputNotFoundError('missing.png').message).toBe('input not found: missing.png');
  });
});
