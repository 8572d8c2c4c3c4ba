import type { PipelineConfig } from '../../config/pipeline.js';
import { OpenAiChatClient } from '../llm/ChatClient.js';
import type { OcrEngine } from './OcrEngine.js';
import { PaddleOcrVlService } from './PaddleOcrVlService.js';
import { VisionLlmOcrService } from './VisionLlmOcrService.js';

export type { OcrEngine } from './OcrEngine.js';
export { PaddleOcrVlService } from './PaddleOcrVlService.js';
export { VisionLlmOcrService } from './VisionLlmOcrService.js';

export function createOcrEngine(config: PipelineConfig): OcrEngine {
  if (config.ocr.engine === 'vision-llm') {
    // Vision transcription goes through the same OpenAI-compatible endpoint as extraction
    return new VisionLlmOcrService(new OpenAiChatClient(config.llm), config.ocr);
  }
  return new PaddleOcrVlService(config.ocr);
}
