/**
 * Core type definitions for the exam paper parsing pipeline
 */

import type { QuestionRecord } from '../services/extraction/questionSchema.js';

export type { QuestionRecord, SubQuestion } from '../services/extraction/questionSchema.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

// Input handed to an OCR engine (one uploaded file or one file on disk)
export interface OcrSource {
  kind: 'image' | 'pdf';
  fileName: string;
  data: Buffer;
}

// One recognised page
export interface OcrPage {
  pageIndex: number; // 0-based within its source
  markdown: string;
  images: Record<string, Buffer>; // relative path referenced by the markdown -> bytes
  startsParagraph: boolean;
  endsParagraph: boolean;
}

export type ExtractionResult =
  | { kind: 'structured'; questions: QuestionRecord[] }
  | { kind: 'raw'; text: string };

export interface ParseRunResult {
  data: JsonValue;
  json: string;
  markdownName: string;
  pageCount: number;
}

export interface SeparateRunResult {
  saved: string[];
  failed: string[];
}

// HTTP response envelope for /parse-docs
export interface ParseDocsResponse {
  success: boolean;
  request_id: string;
  data: JsonValue;
  errors: string[];
  warnings: string[];
}
