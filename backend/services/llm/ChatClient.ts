import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { LlmConfig } from '../../config/pipeline.js';

/**
 * Chat request for an OpenAI-compatible endpoint. Self-hosted Qwen servers (vLLM, SGLang)
 * read `chat_template_kwargs` to switch the reasoning trace on or off.
 */
export type ChatRequest = ChatCompletionCreateParamsNonStreaming & {
  chat_template_kwargs?: { enable_thinking: boolean };
};

export interface ChatClient {
  /** Resolves to the first choice's message text, '' when the model sent none. */
  complete(request: ChatRequest): Promise<string>;
}

export class OpenAiChatClient implements ChatClient {
  private client: OpenAI;

  constructor(config: Pick<LlmConfig, 'baseURL' | 'apiKey' | 'maxRetries' | 'timeoutMs'>) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: config.maxRetries,
      timeout: config.timeoutMs
    });
  }

  async complete(request: ChatRequest): Promise<string> {
    const completion = await this.client.chat.completions.create(request);
    return completion.choices[0]?.message?.content ?? '';
  }
}
