/**
 * DocumentParsePipeline
 * OCR → merged markdown → question extraction → embedded images, for one or many inputs.
 */

import * as path from 'path';
import fs from 'fs/promises';
import type { PipelineConfig } from '../../config/pipeline.js';
import type { JsonValue, OcrPage, OcrSource, ParseRunResult, SeparateRunResult } from '../../types/index.js';
import { ErrorHandler, InputNotFoundError, PipelineInputError } from '../../utils/errorHandler.js';
import { collectImagesFromDir, isImagePath, isPdfPath, pathKind, stemOf } from '../../utils/fileTypes.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';
import type { QuestionExtractor } from '../extraction/QuestionExtractionService.js';
import { QuestionExtractionService } from '../extraction/QuestionExtractionService.js';
import { ImageInliner, type ImageInlinerOptions } from '../images/ImageInliner.js';
import { MarkdownAggregator } from '../markdown/MarkdownAggregator.js';
import { createOcrEngine, type OcrEngine } from '../ocr/index.js';
import { PdfProcessingService } from '../pdf/PdfProcessingService.js';

export interface DocumentParsePipelineDeps {
  ocrEngine: OcrEngine;
  extractor: QuestionExtractor;
  images: ImageInlinerOptions;
}

interface PlannedSource {
  filePath: string;
  kind: OcrSource['kind'];
}

interface InputPlan {
  sources: PlannedSource[];
  markdownName: string;
}

function toSource(filePath: string): PlannedSource | undefined {
  if (isPdfPath(filePath)) return { filePath, kind: 'pdf' };
  if (isImagePath(filePath)) return { filePath, kind: 'image' };
  return undefined;
}

export class DocumentParsePipeline {
  constructor(private readonly deps: DocumentParsePipelineDeps) {}

  /**
   * Parse one input (image, PDF or directory of images) or a list of inputs into a
   * single question array. Region images and the merged markdown are written to
   * outputDir while the run is in progress.
   */
  async runUnified(input: string | string[], outputDir: string): Promise<ParseRunResult> {
    PipelineLogger.info('PIPELINE', 'Preprocessing inputs');
    const plan = Array.isArray(input) ? await this.planList(input) : await this.planSingle(input);

    const pages = await this.recognizeAll(plan.sources);
    if (pages.length === 0) {
      throw new PipelineInputError('no valid image or pdf content');
    }

    await fs.mkdir(outputDir, { recursive: true });
    const markdown = MarkdownAggregator.concatenatePages(pages);
    const mdPath = await MarkdownAggregator.writeMarkdown(outputDir, plan.markdownName, markdown);
    await MarkdownAggregator.saveImages(pages, outputDir);
    PipelineLogger.success('PIPELINE', `Markdown generated: ${mdPath} (${pages.length} page(s))`);

    let data: JsonValue;
    try {
      data = await this.extractAndInline(markdown, outputDir);
    } finally {
      await fs.rm(mdPath, { force: true });
      PipelineLogger.info('PIPELINE', 'Temporary files cleaned');
    }

    return {
      data,
      json: JSON.stringify(data),
      markdownName: plan.markdownName,
      pageCount: pages.length
    };
  }

  /**
   * Parse every image on its own and write <stem>.json beside it.
   * Failures are logged and reported, not thrown.
   */
  async processSeparately(target: string): Promise<SeparateRunResult> {
    const kind = await pathKind(target);
    let images: string[];
    if (kind === 'missing') {
      throw new InputNotFoundError(target);
    } else if (kind === 'directory') {
      images = await collectImagesFromDir(target);
      if (images.length === 0) {
        throw new PipelineInputError('no images found in directory');
      }
    } else if (kind === 'file' && isImagePath(target)) {
      images = [target];
    } else {
      throw new PipelineInputError(`not an image file or directory: ${target}`);
    }

    const result: SeparateRunResult = { saved: [], failed: [] };
    for (const imagePath of images) {
      try {
        const run = await this.runUnified(imagePath, path.dirname(imagePath));
        const jsonPath = path.join(path.dirname(imagePath), `${stemOf(imagePath)}.json`);
        await fs.writeFile(jsonPath, run.json, 'utf-8');
        PipelineLogger.success('PIPELINE', `Saved: ${jsonPath}`);
        result.saved.push(jsonPath);
      } catch (error) {
        PipelineLogger.error('PIPELINE', `Failed: ${imagePath} (${ErrorHandler.getMessage(error)})`);
        result.failed.push(imagePath);
      }
    }
    return result;
  }

  private async planList(inputs: string[]): Promise<InputPlan> {
    const existing: Array<{ filePath: string; kind: 'file' | 'directory' }> = [];
    for (const filePath of inputs) {
      const kind = await pathKind(filePath);
      if (kind === 'file' || kind === 'directory') {
        existing.push({ filePath, kind });
      } else {
        PipelineLogger.warn('PIPELINE', `Skipping missing input: ${filePath}`);
      }
    }
    if (existing.length === 0) {
      throw new PipelineInputError('no valid inputs');
    }

    const sources: PlannedSource[] = [];
    for (const entry of existing) {
      if (entry.kind === 'directory') {
        const images = await collectImagesFromDir(entry.filePath);
        sources.push(...images.map(filePath => ({ filePath, kind: 'image' as const })));
        continue;
      }
      const source = toSource(entry.filePath);
      if (source) {
        sources.push(source);
      } else {
        PipelineLogger.warn('PIPELINE', `Skipping unsupported file: ${entry.filePath}`);
      }
    }
    return { sources, markdownName: 'combined.md' };
  }

  private async planSingle(input: string): Promise<InputPlan> {
    const kind = await pathKind(input);
    if (kind === 'missing') {
      throw new InputNotFoundError(input);
    }

    if (kind === 'directory') {
      const images = await collectImagesFromDir(input);
      if (images.length === 0) {
        throw new PipelineInputError('no images found in directory');
      }
      const markdownName = images.length > 1
        ? `${path.basename(path.resolve(input))}.md`
        : `${stemOf(images[0])}.md`;
      return { sources: images.map(filePath => ({ filePath, kind: 'image' as const })), markdownName };
    }

    const source = kind === 'file' ? toSource(input) : undefined;
    if (!source) {
      throw new PipelineInputError('unsupported file type');
    }
    return { sources: [source], markdownName: `${stemOf(input)}.md` };
  }

  private async recognizeAll(sources: PlannedSource[]): Promise<OcrPage[]> {
    const pages: OcrPage[] = [];
    for (const planned of sources) {
      const data = await fs.readFile(planned.filePath);
      const fileName = path.basename(planned.filePath);
      if (data.length === 0) {
        PipelineLogger.warn('PIPELINE', `Skipping empty file: ${planned.filePath}`);
        continue;
      }
      if (planned.kind === 'pdf') {
        const pageCount = await PdfProcessingService.countPages(data, fileName);
        PipelineLogger.info('PIPELINE', `${fileName}: ${pageCount} PDF page(s)`);
      }

      const recognized = await this.deps.ocrEngine.recognize({ kind: planned.kind, fileName, data });
      pages.push(...recognized);
    }
    return pages;
  }

  private async extractAndInline(markdown: string, outputDir: string): Promise<JsonValue> {
    const extraction = await this.deps.extractor.extract(markdown);
    PipelineLogger.success('PIPELINE', 'LLM extraction finished');

    PipelineLogger.info('PIPELINE', 'Base64 conversion started');
    const inliner = new ImageInliner(outputDir, this.deps.images);
    const data: JsonValue = extraction.kind === 'structured'
      ? await inliner.inline(extraction.questions)
      : await inliner.inlineText(extraction.text);
    const removed = await inliner.cleanup();
    PipelineLogger.success('PIPELINE', `Base64 conversion finished (${removed} image file(s) removed)`);
    return data;
  }
}

export function createDocumentParsePipeline(config: PipelineConfig): DocumentParsePipeline {
  return new DocumentParsePipeline({
    ocrEngine: createOcrEngine(config),
    extractor: QuestionExtractionService.fromConfig(config.llm),
    images: config.images
  });
}
