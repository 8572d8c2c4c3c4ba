/**
 * Centralized prompt configuration for OCR transcription and question extraction.
 * Long prompt bodies live in ./prompts; placeholders use {{NAME}} and are filled here.
 */

import questionExtractionSystemPrompt from './prompts/question_extraction_system_prompt.js';
import questionExtractionUserPrompt from './prompts/question_extraction_user_prompt.js';
import pageTranscriptionSystemPrompt from './prompts/page_transcription_system_prompt.js';
import { QUESTION_TEMPLATE } from './questionTemplate.js';

export function fillPlaceholders(template: string, values: Record<string, string>): string {
  // Function replacer: '$' in LaTeX must not be read as a replacement pattern
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) => values[key] ?? match);
}

export const AI_PROMPTS = {
  questionExtraction: {
    system: fillPlaceholders(questionExtractionSystemPrompt, {
      TEMPLATE: JSON.stringify(QUESTION_TEMPLATE, null, 2)
    }),
    user: (markdown: string): string => fillPlaceholders(questionExtractionUserPrompt, { MARKDOWN: markdown })
  },

  pageTranscription: {
    system: pageTranscriptionSystemPrompt,
    user: 'Transcribe this exam page to Markdown.'
  }
} as const;
