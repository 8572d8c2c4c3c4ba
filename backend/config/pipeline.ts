/**
 * Pipeline configuration
 * Read from environment variables (loaded from .env.local / .env at process entry)
 */

import { z } from 'zod';
import { ConfigurationError } from '../utils/errorHandler.js';

const flag = (fallback: boolean) =>
  z.enum(['true', 'false', '1', '0'])
    .optional()
    .transform(value => (value === undefined ? fallback : value === 'true' || value === '1'));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalText = z.string().trim().min(1).optional();

const envSchema = z.object({
  OCR_ENGINE: z.enum(['paddle-vl', 'vision-llm']).default('paddle-vl'),
  OCR_VL_URL: z.string().url().default('http://localhost:8080'),
  OCR_VL_TIMEOUT_MS: positiveInt(120_000),
  OCR_VL_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  OCR_VL_DOC_ORIENTATION: flag(true),
  OCR_VL_DOC_UNWARPING: flag(true),
  VISION_MODEL_NAME: z.string().min(1).default('gpt-4o'),
  PDF_DPI: positiveInt(150),

  LLM_MODEL_URL: z.string().url().optional(),
  LLM_MODEL_API_KEY: optionalText,
  OPENAI_API_KEY: optionalText,
  LLM_MODEL_NAME: z.string().min(1).default('qwen3-next-80b-a3b-instruct'),
  LLM_ENABLE_THINKING: flag(false),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  LLM_TIMEOUT_MS: positiveInt(300_000),

  IMAGE_ARRAY_ENCODING: z.enum(['base64', 'data-uri']).default('base64'),
  KEEP_IMAGE_FILES: flag(false),
  OUTPUT_DIR: z.string().min(1).default('output'),
  UPLOAD_DIR: z.string().min(1).default('uploads'),

  PORT: positiveInt(5001),
  CORS_ORIGINS: z.string().default('*'),
  RATE_LIMIT_MAX: positiveInt(100),

  IMAGE_HOST_UPLOAD_URL: z.string().url().optional(),
  IMAGE_HOST_TOKEN: optionalText,
  IMAGE_HOST_INTERNAL_ORIGIN: optionalText,
  IMAGE_HOST_PUBLIC_ORIGIN: optionalText
});

export type OcrEngineName = 'paddle-vl' | 'vision-llm';
export type ImageArrayEncoding = 'base64' | 'data-uri';

export interface LlmConfig {
  baseURL?: string;
  apiKey: string;
  model: string;
  enableThinking: boolean;
  maxRetries: number;
  timeoutMs: number;
}

export interface PipelineConfig {
  ocr: {
    engine: OcrEngineName;
    serviceUrl: string;
    timeoutMs: number;
    maxRetries: number;
    useDocOrientationClassify: boolean;
    useDocUnwarping: boolean;
    visionModel: string;
    pdfDpi: number;
  };
  llm: LlmConfig;
  images: {
    arrayEncoding: ImageArrayEncoding;
    keepFiles: boolean;
  };
  outputDir: string;
  uploadDir: string;
  server: {
    port: number;
    corsOrigins: string[] | '*';
    rateLimitMax: number;
  };
  imageHost: {
    uploadUrl?: string;
    token?: string;
    internalOrigin?: string;
    publicOrigin?: string;
  };
}

/**
 * Build the pipeline configuration from an environment map.
 * @throws ConfigurationError naming every invalid variable
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  // Empty strings behave as unset
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  const origins = e.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean);

  const config: PipelineConfig = {
    ocr: {
      engine: e.OCR_ENGINE,
      serviceUrl: e.OCR_VL_URL.replace(/\/+$/, ''),
      timeoutMs: e.OCR_VL_TIMEOUT_MS,
      maxRetries: e.OCR_VL_MAX_RETRIES,
      useDocOrientationClassify: e.OCR_VL_DOC_ORIENTATION,
      useDocUnwarping: e.OCR_VL_DOC_UNWARPING,
      visionModel: e.VISION_MODEL_NAME,
      pdfDpi: e.PDF_DPI
    },
    llm: {
      baseURL: e.LLM_MODEL_URL,
      // Self-hosted OpenAI-compatible servers accept any key
      apiKey: e.LLM_MODEL_API_KEY ?? e.OPENAI_API_KEY ?? 'EMPTY',
      model: e.LLM_MODEL_NAME,
      enableThinking: e.LLM_ENABLE_THINKING,
      maxRetries: e.LLM_MAX_RETRIES,
      timeoutMs: e.LLM_TIMEOUT_MS
    },
    images: {
      arrayEncoding: e.IMAGE_ARRAY_ENCODING,
      keepFiles: e.KEEP_IMAGE_FILES
    },
    outputDir: e.OUTPUT_DIR,
    uploadDir: e.UPLOAD_DIR,
    server: {
      port: e.PORT,
      corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
      rateLimitMax: e.RATE_LIMIT_MAX
    },
    imageHost: {
      uploadUrl: e.IMAGE_HOST_UPLOAD_URL,
      token: e.IMAGE_HOST_TOKEN,
      internalOrigin: e.IMAGE_HOST_INTERNAL_ORIGIN,
      publicOrigin: e.IMAGE_HOST_PUBLIC_ORIGIN
    }
  };

  return Object.freeze(config);
}
