/**
 * MarkdownAggregator
 * Merges per-page OCR markdown into one document and persists the region images it references.
 */

import * as path from 'path';
import fs from 'fs/promises';
import type { OcrPage } from '../../types/index.js';
import { PipelineInputError } from '../../utils/errorHandler.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

const CJK_IDEOGRAPH = /[\u4e00-\u9fff]/;

function isCjk(char: string | undefined): boolean {
  return char !== undefined && CJK_IDEOGRAPH.test(char);
}

export class MarkdownAggregator {

  /**
   * Concatenate page markdown in order.
   * A paragraph that runs across a page break is rejoined: directly when either side of the
   * break is a CJK ideograph, otherwise with a single space. All other pages are separated
   * by a blank line.
   */
  static concatenatePages(pages: OcrPage[]): string {
    let merged = '';
    let previousEndsParagraph = true;

    pages.forEach((page, index) => {
      const text = page.markdown;
      if (index === 0) {
        merged = text;
      } else if (!page.startsParagraph && !previousEndsParagraph) {
        const lastChar = merged.length > 0 ? merged[merged.length - 1] : undefined;
        const firstChar = text.length > 0 ? text[0] : undefined;
        merged += isCjk(lastChar) || isCjk(firstChar) ? text : ` ${text}`;
      } else {
        merged += `\n\n${text}`;
      }
      previousEndsParagraph = page.endsParagraph;
    });

    return merged;
  }

  /**
   * Write every region image referenced by the pages below outputDir.
   * @returns absolute paths of the written files
   */
  static async saveImages(pages: OcrPage[], outputDir: string): Promise<string[]> {
    const root = path.resolve(outputDir);
    const written: string[] = [];

    for (const page of pages) {
      for (const [relPath, bytes] of Object.entries(page.images)) {
        const target = path.resolve(root, relPath);
        if (path.isAbsolute(relPath) || !target.startsWith(root + path.sep)) {
          throw new PipelineInputError(`image path escapes output directory: ${relPath}`);
        }
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, bytes);
        written.push(target);
      }
    }

    PipelineLogger.debug('MARKDOWN', `Saved ${written.length} region image(s) to ${root}`);
    return written;
  }

  static async writeMarkdown(outputDir: string, fileName: string, text: string): Promise<string> {
    await fs.mkdir(outputDir, { recursive: true });
    const mdPath = path.join(outputDir, fileName);
    await fs.writeFile(mdPath, text, 'utf-8');
    return mdPath;
  }
}
