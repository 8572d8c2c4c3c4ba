/**
 * VisionLlmOcrService
 * Transcribes page images to Markdown with an OpenAI-compatible vision model.
 * PDFs are rasterised with mupdf first; pages carry no region images.
 */

import { AI_PROMPTS } from '../../config/prompts.js';
import type { PipelineConfig } from '../../config/pipeline.js';
import type { OcrPage, OcrSource } from '../../types/index.js';
import { mimeFromPath } from '../../utils/fileTypes.js';
import { ImageUtils } from '../../utils/ImageUtils.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';
import type { ChatClient, ChatRequest } from '../llm/ChatClient.js';
import { PdfProcessingService } from '../pdf/PdfProcessingService.js';
import type { OcrEngine } from './OcrEngine.js';

const WRAPPING_FENCE = /^```[\w-]*[ \t]*\n([\s\S]*?)\n?```$/;

// Models sometimes wrap the whole transcription in a ```markdown fence
function unwrapFence(reply: string): string {
  const trimmed = reply.trim();
  const match = trimmed.match(WRAPPING_FENCE);
  return match ? match[1].trim() : trimmed;
}

export class VisionLlmOcrService implements OcrEngine {
  readonly name = 'vision-llm';

  constructor(
    private readonly client: ChatClient,
    private readonly config: Pick<PipelineConfig['ocr'], 'visionModel' | 'pdfDpi'>
  ) {}

  async recognize(source: OcrSource): Promise<OcrPage[]> {
    const pageImages = source.kind === 'pdf'
      ? (await PdfProcessingService.renderPages(source.data, this.config.pdfDpi, source.fileName))
        .map(page => ({ data: page.png, mime: 'image/png' }))
      : [{ data: source.data, mime: mimeFromPath(source.fileName) }];

    const pages: OcrPage[] = [];
    for (const [pageIndex, image] of pageImages.entries()) {
      const markdown = await this.transcribe(image.data, image.mime);
      PipelineLogger.debug('VISION OCR', `${source.fileName} page ${pageIndex + 1}/${pageImages.length}: ${markdown.length} chars`);
      pages.push({ pageIndex, markdown, images: {}, startsParagraph: true, endsParagraph: true });
    }
    return pages;
  }

  private async transcribe(imageBuffer: Buffer, mime: string): Promise<string> {
    const imageUrl = await ImageUtils.prepareForVision(imageBuffer, mime);
    const request: ChatRequest = {
      model: this.config.visionModel,
      temperature: 0,
      messages: [
        { role: 'system', content: AI_PROMPTS.pageTranscription.system },
        {
          role: 'user',
          content: [
            { type: 'image_url', image_url: { url: imageUrl, detail: 'high' } },
            { type: 'text', text: AI_PROMPTS.pageTranscription.user }
          ]
        }
      ]
    };
    return unwrapFence(await this.client.complete(request));
  }
}
