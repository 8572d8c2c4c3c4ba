/**
 * PaddleOcrVlService
 * Client for a PaddleOCR-VL layout-parsing server (PaddleX serving API).
 */

import axios from 'axios';
import { z } from 'zod';
import type { PipelineConfig } from '../../config/pipeline.js';
import type { OcrPage, OcrSource } from '../../types/index.js';
import { ErrorHandler, OcrServiceError } from '../../utils/errorHandler.js';
import { ImageUtils } from '../../utils/ImageUtils.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';
import type { OcrEngine } from './OcrEngine.js';

export interface LayoutParsingRequest {
  file: string;
  fileType: 0 | 1; // 0 = pdf, 1 = image
  useDocOrientationClassify: boolean;
  useDocUnwarping: boolean;
  visualize: boolean;
}

export type LayoutParsingPost = (
  url: string,
  body: LayoutParsingRequest,
  options: { timeout: number }
) => Promise<{ data: unknown }>;

const LayoutParsingResponseSchema = z.object({
  errorCode: z.number().optional(),
  errorMsg: z.string().optional(),
  result: z.object({
    layoutParsingResults: z.array(z.object({
      markdown: z.object({
        text: z.string().nullish(),
        images: z.record(z.string()).nullish(),
        isStart: z.boolean().nullish(),
        isEnd: z.boolean().nullish()
      })
    }))
  }).nullish()
});

const defaultPost: LayoutParsingPost = (url, body, options) => axios.post<unknown>(url, body, options);

export class PaddleOcrVlService implements OcrEngine {
  readonly name = 'paddle-vl';

  constructor(
    private readonly config: PipelineConfig['ocr'],
    private readonly post: LayoutParsingPost = defaultPost,
    private readonly retryDelayMs = 1000
  ) {}

  async recognize(source: OcrSource): Promise<OcrPage[]> {
    const startTime = Date.now();
    const body: LayoutParsingRequest = {
      file: source.data.toString('base64'),
      fileType: source.kind === 'pdf' ? 0 : 1,
      useDocOrientationClassify: this.config.useDocOrientationClassify,
      useDocUnwarping: this.config.useDocUnwarping,
      visualize: false
    };

    let data: unknown;
    try {
      const response = await ErrorHandler.withRetry(
        () => this.post(`${this.config.serviceUrl}/layout-parsing`, body, { timeout: this.config.timeoutMs }),
        { retries: this.config.maxRetries, initialDelayMs: this.retryDelayMs, context: `OCR ${source.fileName}` }
      );
      data = response.data;
    } catch (error) {
      if (error instanceof OcrServiceError) throw error;
      const info = ErrorHandler.analyzeError(error);
      throw new OcrServiceError(
        `OCR request for ${source.fileName} failed: ${ErrorHandler.getMessage(error)}`,
        info.status
      );
    }

    const pages = this.toPages(data, source.fileName);
    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    PipelineLogger.debug('OCR', `${source.fileName}: ${pages.length} page(s) in ${duration}s`);
    return pages;
  }

  private toPages(data: unknown, fileName: string): OcrPage[] {
    const parsed = LayoutParsingResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new OcrServiceError(`malformed OCR response for ${fileName}`);
    }

    const { errorCode, errorMsg, result } = parsed.data;
    if (errorCode !== undefined && errorCode !== 0) {
      throw new OcrServiceError(`OCR service error ${errorCode} for ${fileName}: ${errorMsg ?? 'unknown error'}`);
    }
    if (!result) {
      throw new OcrServiceError(`OCR response for ${fileName} has no result`);
    }

    return result.layoutParsingResults.map(({ markdown }, pageIndex) => {
      const images: Record<string, Buffer> = {};
      for (const [relPath, encoded] of Object.entries(markdown.images ?? {})) {
        images[relPath] = ImageUtils.decodeBase64(encoded);
      }
      return {
        pageIndex,
        markdown: markdown.text ?? '',
        images,
        startsParagraph: markdown.isStart ?? true,
        endsParagraph: markdown.isEnd ?? true
      };
    });
  }
}
