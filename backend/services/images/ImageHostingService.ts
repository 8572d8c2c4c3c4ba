/**
 * ImageHostingService
 * Uploads Base64 images embedded in question JSON to an image host and swaps in the hosted URLs.
 */

import axios from 'axios';
import * as path from 'path';
import fs from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { PipelineConfig } from '../../config/pipeline.js';
import type { JsonValue } from '../../types/index.js';
import { ConfigurationError, ErrorHandler } from '../../utils/errorHandler.js';
import { collectFilesRecursive } from '../../utils/fileTypes.js';
import { ImageUtils } from '../../utils/ImageUtils.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

/** Sends one JPEG to the host; resolves to the URL it reports, or undefined on failure. */
export type ImageUploader = (jpeg: Buffer, fileName: string) => Promise<string | undefined>;

const DATA_URI_IMAGE = /^data:image\/(png|jpe?g|gif|webp);base64,/i;
const PURE_BASE64 = /^[A-Za-z0-9+/=\s]{200,}$/;
const HTML_IMG_BASE64 = /(<img[^>]+src=["'])(data:image\/[^"']+|\/9[^"']+)(["'])/gi;

const UploadResponseSchema = z.object({ url: z.string() });

// Characters kept as-is in the path of a returned URL
const PATH_SAFE_ESCAPES: Record<string, string> = {
  '%2F': '/', '%3A': ':', '%40': '@', '%24': '$', '%26': '&', '%2B': '+', '%2C': ',', '%3B': ';', '%3D': '='
};

/**
 * Percent-encode a URL path, leaving / : @ ! $ & ' ( ) * + , ; = untouched.
 */
export function quotePath(urlPath: string): string {
  return encodeURIComponent(urlPath).replace(/%(2F|3A|40|24|26|2B|2C|3B|3D)/g, code => PATH_SAFE_ESCAPES[code] ?? code);
}

/** JPEG Base64 without a data-URI prefix (JPEG payloads start with "/9"). */
export function isPureBase64Image(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.startsWith('/9') && PURE_BASE64.test(trimmed);
}

export function createHttpUploader(uploadUrl: string, token: string | undefined): ImageUploader {
  return async (jpeg, fileName) => {
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(jpeg)], { type: 'image/jpeg' }), fileName);

    try {
      const response = await axios.post<unknown>(uploadUrl, form, {
        headers: token ? { 'AI-token': token } : {},
        validateStatus: () => true
      });
      if (response.status !== 200) {
        PipelineLogger.warn('IMAGE HOST', `Upload failed with HTTP ${response.status}`);
        return undefined;
      }
      const parsed = UploadResponseSchema.safeParse(response.data);
      return parsed.success ? parsed.data.url : undefined;
    } catch (error) {
      PipelineLogger.warn('IMAGE HOST', ErrorHandler.getLogMessage(error, 'image upload'));
      return undefined;
    }
  };
}

export class ImageHostingService {
  private readonly cache = new Map<string, string>();

  constructor(
    private readonly uploader: ImageUploader,
    private readonly origins: Pick<PipelineConfig['imageHost'], 'internalOrigin' | 'publicOrigin'> = {}
  ) {}

  static fromConfig(config: PipelineConfig['imageHost']): ImageHostingService {
    if (!config.uploadUrl) {
      throw new ConfigurationError('IMAGE_HOST_UPLOAD_URL is not set');
    }
    return new ImageHostingService(createHttpUploader(config.uploadUrl, config.token), config);
  }

  /**
   * Walk any JSON value and replace embedded Base64 images with hosted URLs.
   * Payloads whose upload fails are left unchanged.
   */
  async replaceBase64InJson(value: JsonValue): Promise<JsonValue> {
    if (Array.isArray(value)) {
      const items: JsonValue[] = [];
      for (const item of value) {
        items.push(await this.replaceBase64InJson(item));
      }
      return items;
    }

    if (value !== null && typeof value === 'object') {
      const result: { [key: string]: JsonValue } = {};
      for (const [key, child] of Object.entries(value)) {
        result[key] = await this.replaceBase64InJson(child);
      }
      return result;
    }

    if (typeof value !== 'string') return value;

    let text = value;
    if (text.includes('<img') && (text.includes('base64') || text.trim().startsWith('/9'))) {
      text = await this.replaceInHtml(text);
    }
    if (DATA_URI_IMAGE.test(text) || isPureBase64Image(text)) {
      return (await this.upload(text)) ?? text;
    }
    return text;
  }

  async processJsonFile(inputPath: string, outputPath: string): Promise<void> {
    const data: JsonValue = JSON.parse(await fs.readFile(inputPath, 'utf-8'));
    const replaced = await this.replaceBase64InJson(data);

    const outDir = path.dirname(outputPath);
    await fs.mkdir(outDir, { recursive: true });
    await fs.writeFile(outputPath, JSON.stringify(replaced, null, 2), 'utf-8');
  }

  /**
   * Process every .json file under inputDir, mirroring relative paths into outputDir.
   * @returns written output paths
   */
  async processJsonFolder(inputDir: string, outputDir: string): Promise<string[]> {
    const written: string[] = [];
    for (const inputPath of await collectFilesRecursive(inputDir, '.json')) {
      const outputPath = path.join(outputDir, path.relative(inputDir, inputPath));
      PipelineLogger.info('IMAGE HOST', `Processing ${inputPath}`);
      await this.processJsonFile(inputPath, outputPath);
      written.push(outputPath);
    }
    return written;
  }

  private async replaceInHtml(html: string): Promise<string> {
    let output = '';
    let cursor = 0;
    for (const match of html.matchAll(HTML_IMG_BASE64)) {
      const index = match.index ?? 0;
      const url = await this.upload(match[2]);
      output += html.slice(cursor, index) + (url === undefined ? match[0] : `${match[1]}${url}${match[3]}`);
      cursor = index + match[0].length;
    }
    return output + html.slice(cursor);
  }

  private async upload(payload: string): Promise<string | undefined> {
    const cached = this.cache.get(payload);
    if (cached !== undefined) return cached;

    let jpeg: Buffer;
    try {
      jpeg = await ImageUtils.toJpeg(ImageUtils.decodeBase64(payload));
    } catch (error) {
      PipelineLogger.warn('IMAGE HOST', `Skipping undecodable image (${ErrorHandler.getMessage(error)})`);
      return undefined;
    }

    const reported = await this.uploader(jpeg, `${uuidv4().replace(/-/g, '')}.jpg`);
    if (reported === undefined) return undefined;

    const url = this.toPublicUrl(reported);
    this.cache.set(payload, url);
    PipelineLogger.debug('IMAGE HOST', `Uploaded image -> ${url}`);
    return url;
  }

  private toPublicUrl(reported: string): string {
    const { internalOrigin, publicOrigin } = this.origins;
    const rewritten = internalOrigin && publicOrigin
      ? reported.split(internalOrigin).join(publicOrigin)
      : reported;

    const schemeEnd = rewritten.indexOf('://');
    if (schemeEnd === -1) return rewritten;
    const pathStart = rewritten.indexOf('/', schemeEnd + 3);
    if (pathStart === -1) return rewritten;
    return rewritten.slice(0, pathStart + 1) + quotePath(rewritten.slice(pathStart + 1));
  }
}
