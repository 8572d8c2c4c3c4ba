/**
 * QuestionExtractionService
 * Turns merged exam markdown into template-shaped question records via an OpenAI-compatible chat model.
 */

import { AI_PROMPTS } from '../../config/prompts.js';
import type { LlmConfig } from '../../config/pipeline.js';
import type { ExtractionResult, QuestionRecord } from '../../types/index.js';
import { ExtractionError } from '../../utils/errorHandler.js';
import { JsonUtils } from '../../utils/JsonUtils.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';
import { OpenAiChatClient, type ChatClient, type ChatRequest } from '../llm/ChatClient.js';
import { QuestionRecordSchema } from './questionSchema.js';

export interface QuestionExtractor {
  extract(markdown: string): Promise<ExtractionResult>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class QuestionExtractionService implements QuestionExtractor {
  constructor(
    private readonly client: ChatClient,
    private readonly options: Pick<LlmConfig, 'model' | 'enableThinking'>
  ) {}

  static fromConfig(config: LlmConfig): QuestionExtractionService {
    return new QuestionExtractionService(new OpenAiChatClient(config), config);
  }

  async extract(markdown: string): Promise<ExtractionResult> {
    const startTime = Date.now();
    const request: ChatRequest = {
      model: this.options.model,
      messages: [
        { role: 'system', content: AI_PROMPTS.questionExtraction.system },
        { role: 'user', content: AI_PROMPTS.questionExtraction.user(markdown) }
      ],
      chat_template_kwargs: { enable_thinking: this.options.enableThinking }
    };

    const reply = await this.client.complete(request);
    if (reply.trim() === '') {
      throw new ExtractionError(`model ${this.options.model} returned an empty reply`);
    }

    const content = JsonUtils.stripCodeFences(reply);
    const parsed = JsonUtils.parseLenient(content);
    const duration = ((Date.now() - startTime) / 1000).toFixed(1);

    if (parsed === undefined) {
      PipelineLogger.warn('EXTRACTION', `Reply is not valid JSON, keeping raw text (${duration}s)`);
      return { kind: 'raw', text: content };
    }

    const questions = QuestionExtractionService.normalizeQuestions(parsed);
    PipelineLogger.success('EXTRACTION', `Extracted ${questions.length} question(s) in ${duration}s`);
    return { kind: 'structured', questions };
  }

  /**
   * Accepts an array of records, a single record, or an object wrapping the array
   * under `questions` or `data`. Items that are not objects are dropped.
   */
  static normalizeQuestions(root: unknown): QuestionRecord[] {
    let items: unknown[];
    if (Array.isArray(root)) {
      items = root;
    } else if (isRecord(root) && Array.isArray(root.questions)) {
      items = root.questions;
    } else if (isRecord(root) && Array.isArray(root.data)) {
      items = root.data;
    } else {
      items = [root];
    }

    const questions: QuestionRecord[] = [];
    items.forEach((item, index) => {
      if (!isRecord(item)) {
        PipelineLogger.debug('EXTRACTION', `Dropping non-object item at index ${index}`);
        return;
      }
      const result = QuestionRecordSchema.safeParse(item);
      if (result.success) {
        questions.push(result.data);
      } else {
        PipelineLogger.warn('EXTRACTION', `Dropping item ${index}: ${result.error.issues[0]?.message ?? 'invalid record'}`);
      }
    });
    return questions;
  }
}
