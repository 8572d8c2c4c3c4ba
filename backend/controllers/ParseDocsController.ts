import type { Request, Response } from 'express';
import * as path from 'path';
import fs from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import type { PipelineConfig } from '../config/pipeline.js';
import type { DocumentParsePipeline } from '../services/pipeline/DocumentParsePipeline.js';
import type { ParseDocsResponse } from '../types/index.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { isImagePath, isPdfPath } from '../utils/fileTypes.js';
import { PipelineLogger } from '../utils/LoggerUtils.js';

export type ParseDocsPipeline = Pick<DocumentParsePipeline, 'runUnified'>;

// multer hands over multipart file names as latin1
function decodeFileName(originalName: string): string {
  return Buffer.from(originalName, 'latin1').toString('utf8');
}

function envelope(requestId: string, fields: Partial<ParseDocsResponse>): ParseDocsResponse {
  return {
    success: false,
    request_id: requestId,
    data: null,
    errors: [],
    warnings: [],
    ...fields
  };
}

export class ParseDocsController {
  constructor(
    private readonly pipeline: ParseDocsPipeline,
    private readonly config: Pick<PipelineConfig, 'uploadDir' | 'outputDir'>
  ) {}

  /**
   * POST /parse-docs
   * Accepts several images or a single PDF (plus images) under the `files` field.
   */
  handle = async (req: Request, res: Response): Promise<void> => {
    const requestId = uuidv4().replace(/-/g, '');
    const uploaded = Array.isArray(req.files) ? req.files : [];

    if (uploaded.length === 0) {
      res.status(400).json(envelope(requestId, { errors: ['No files uploaded'] }));
      return;
    }

    const images: Express.Multer.File[] = [];
    const pdfs: Express.Multer.File[] = [];
    const warnings: string[] = [];
    for (const file of uploaded) {
      const name = decodeFileName(file.originalname);
      if (isImagePath(name)) {
        images.push(file);
      } else if (isPdfPath(name)) {
        pdfs.push(file);
      } else {
        warnings.push(`Unsupported file type: ${name}`);
      }
    }

    if (images.length === 0 && pdfs.length === 0) {
      res.status(400).json(envelope(requestId, { errors: ['No valid image or PDF files'], warnings }));
      return;
    }
    if (pdfs.length > 1) {
      res.status(400).json(envelope(requestId, { errors: ['Only a single PDF file may be uploaded'], warnings }));
      return;
    }

    const format = pdfs.length === 0 ? 'images' : images.length === 0 ? 'PDF' : 'images + PDF';
    PipelineLogger.info('PARSE DOCS', `Request ${requestId}: received ${images.length + pdfs.length} file(s) (${format})`);

    const uploadDir = path.join(this.config.uploadDir, requestId);
    const outputDir = path.join(this.config.outputDir, 'api', requestId);
    let status = 200;
    let body: ParseDocsResponse;

    try {
      const staged = await this.stageUploads(uploadDir, [...images, ...pdfs]);
      const result = await this.pipeline.runUnified(staged, outputDir);
      body = envelope(requestId, { success: true, data: result.data, warnings });
      PipelineLogger.success('PARSE DOCS', `Request ${requestId}: ${result.pageCount} page(s) parsed`);
    } catch (error) {
      status = ErrorHandler.getHttpStatus(error);
      const message = ErrorHandler.getMessage(error);
      PipelineLogger.error('PARSE DOCS', `Request ${requestId} failed (${status})`, error);
      body = envelope(requestId, { errors: [message], warnings });
    } finally {
      await this.removeDir(uploadDir);
      await this.removeDir(outputDir);
    }

    res.status(status).json(body);
  };

  private async stageUploads(uploadDir: string, files: Express.Multer.File[]): Promise<string[]> {
    await fs.mkdir(uploadDir, { recursive: true });
    const paths: string[] = [];
    for (const [index, file] of files.entries()) {
      // basename strips any directory part a client put in the name
      const target = path.join(uploadDir, `${index}_${path.basename(decodeFileName(file.originalname))}`);
      await fs.writeFile(target, file.buffer);
      paths.push(target);
    }
    return paths;
  }

  private async removeDir(dir: string): Promise<void> {
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (error) {
      PipelineLogger.warn('PARSE DOCS', `Could not remove ${dir}: ${ErrorHandler.getMessage(error)}`);
    }
  }
}
