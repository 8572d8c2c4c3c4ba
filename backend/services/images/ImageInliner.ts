/**
 * ImageInliner
 * Replaces region-image paths in extracted question JSON with embedded Base64 payloads.
 */

import * as path from 'path';
import fs from 'fs/promises';
import type { ImageArrayEncoding } from '../../config/pipeline.js';
import type { JsonValue } from '../../types/index.js';
import { mimeFromPath } from '../../utils/fileTypes.js';
import { ImageUtils } from '../../utils/ImageUtils.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

export interface ImageInlinerOptions {
  arrayEncoding: ImageArrayEncoding;
  keepFiles: boolean;
}

const IMAGE_ARRAY_FIELDS = new Set(['question_images', 'analysis_images']);
const MARKDOWN_IMAGE = /!\[([^\]]*)\]\(([^)]+)\)/g;
const HTML_IMAGE = /(<img\b[^>]*?\bsrc\s*=\s*)(["'])([^"']+)\2/gi;
const QUOTED_IMGS_PATH = /"(imgs\/[^"]+)"/g;

function isRemoteOrInline(ref: string): boolean {
  return /^(https?:|data:)/i.test(ref);
}

function isInlineCandidate(ref: string): boolean {
  return ref.startsWith('imgs/') || path.isAbsolute(ref);
}

/**
 * String.replace with an async replacer; matches are resolved one after another.
 */
async function replaceAsync(
  input: string,
  pattern: RegExp,
  replacer: (match: RegExpExecArray) => Promise<string>
): Promise<string> {
  const matches = [...input.matchAll(pattern)];
  if (matches.length === 0) return input;

  let output = '';
  let cursor = 0;
  for (const match of matches) {
    const index = match.index ?? 0;
    output += input.slice(cursor, index) + await replacer(match);
    cursor = index + match[0].length;
  }
  return output + input.slice(cursor);
}

export class ImageInliner {
  private readonly cache = new Map<string, Buffer | null>();
  private readonly consumed = new Set<string>();
  private readonly root: string;

  constructor(
    baseDir: string,
    private readonly options: ImageInlinerOptions
  ) {
    this.root = path.resolve(baseDir);
  }

  /**
   * Returns a copy of the value with every resolvable image reference embedded.
   */
  async inline(value: JsonValue, key?: string): Promise<JsonValue> {
    if (Array.isArray(value)) {
      const encodeItems = key !== undefined && IMAGE_ARRAY_FIELDS.has(key);
      const items: JsonValue[] = [];
      for (const item of value) {
        if (encodeItems && typeof item === 'string') {
          const encoded = await this.encodeForArray(item);
          items.push(encoded === item ? await this.inlineReferences(item) : encoded);
        } else {
          items.push(await this.inline(item));
        }
      }
      return items;
    }

    if (value !== null && typeof value === 'object') {
      const result: { [field: string]: JsonValue } = {};
      for (const [field, child] of Object.entries(value)) {
        result[field] = await this.inline(child, field);
      }
      return result;
    }

    if (typeof value === 'string') {
      if (value.startsWith('imgs/')) {
        const encoded = await this.encodeForArray(value);
        if (encoded !== value) return encoded;
      }
      return this.inlineReferences(value);
    }

    return value;
  }

  /**
   * Inline rules for an unstructured model reply, plus quoted "imgs/..." paths.
   */
  async inlineText(raw: string): Promise<string> {
    const withQuoted = await replaceAsync(raw, QUOTED_IMGS_PATH, async (match) => {
      const encoded = await this.encodeForArray(match[1]);
      return `"${encoded}"`;
    });
    return this.inlineReferences(withQuoted);
  }

  /**
   * Delete every embedded image file below the base directory, unless files are kept.
   * Files referenced from elsewhere are embedded but never removed.
   * @returns number of files removed
   */
  async cleanup(): Promise<number> {
    if (this.options.keepFiles) return 0;

    let removed = 0;
    for (const filePath of this.consumed) {
      try {
        await fs.unlink(filePath);
        removed++;
      } catch (error) {
        PipelineLogger.warn('IMAGE INLINER', `Could not delete ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    this.consumed.clear();
    return removed;
  }

  private async inlineReferences(text: string): Promise<string> {
    const markdownDone = await replaceAsync(text, MARKDOWN_IMAGE, async (match) => {
      const dataUri = await this.toDataUri(match[2]);
      return dataUri === undefined ? match[0] : `![${match[1]}](${dataUri})`;
    });
    return replaceAsync(markdownDone, HTML_IMAGE, async (match) => {
      const dataUri = await this.toDataUri(match[3]);
      return dataUri === undefined ? match[0] : `${match[1]}${match[2]}${dataUri}${match[2]}`;
    });
  }

  private async toDataUri(ref: string): Promise<string | undefined> {
    if (!isInlineCandidate(ref)) return undefined;
    const bytes = await this.read(ref);
    return bytes ? ImageUtils.toDataUrl(bytes, mimeFromPath(ref)) : undefined;
  }

  private async encodeForArray(ref: string): Promise<string> {
    if (isRemoteOrInline(ref)) return ref;
    const bytes = await this.read(ref);
    if (!bytes) return ref;
    return this.options.arrayEncoding === 'data-uri'
      ? ImageUtils.toDataUrl(bytes, mimeFromPath(ref))
      : bytes.toString('base64');
  }

  private async read(ref: string): Promise<Buffer | null> {
    const filePath = path.resolve(this.root, ref);
    const cached = this.cache.get(filePath);
    if (cached !== undefined) return cached;

    let bytes: Buffer | null;
    try {
      bytes = await fs.readFile(filePath);
      if (filePath.startsWith(this.root + path.sep)) {
        this.consumed.add(filePath);
      }
    } catch {
      PipelineLogger.debug('IMAGE INLINER', `Image not found, keeping reference: ${ref}`);
      bytes = null;
    }
    this.cache.set(filePath, bytes);
    return bytes;
  }
}
