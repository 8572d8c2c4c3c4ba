import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import fs from 'fs/promises';
import { QuestionRecordSchema } from '../services/extraction/questionSchema.js';
import type { OcrEngine } from '../services/ocr/index.js';
import { DocumentParsePipeline } from '../services/pipeline/DocumentParsePipeline.js';
import type { ExtractionResult, OcrPage, OcrSource } from '../types/index.js';
import { InputNotFoundError, PipelineInputError } from '../utils/errorHandler.js';
import { createTestPdf } from './helpers/testPdf.js';

// base64 of 'FIG'
const FIG64 = 'RklH';

const fakeEngine: OcrEngine = {
  name: 'fake',
  recognize: async (source: OcrSource): Promise<OcrPage[]> => [{
    pageIndex: 0,
    markdown: `# ${source.fileName}`,
    images: source.fileName.startsWith('1') ? { 'imgs/fig.jpg': Buffer.from('FIG') } : {},
    startsParagraph: true,
    endsParagraph: true
  }]
};

const record = QuestionRecordSchema.parse({
  question_id: '1',
  question_content: '![](imgs/fig.jpg)',
  question_images: ['imgs/fig.jpg']
});

const structured: ExtractionResult = { kind: 'structured', questions: [record] };

describe('DocumentParsePipeline', () => {
  let tmpDir: string;
  let paperDir: string;
  let outDir: string;
  let extract: ReturnType<typeof vi.fn>;
  let pipeline: DocumentParsePipeline;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
    paperDir = path.join(tmpDir, 'paper');
    outDir = path.join(tmpDir, 'out');
    await fs.mkdir(paperDir);
    await fs.writeFile(path.join(paperDir, '1.png'), 'page one');
    await fs.writeFile(path.join(paperDir, '2.jpg'), 'page two');
    await fs.writeFile(path.join(paperDir, 'notes.txt'), 'not an image');

    extract = vi.fn().mockResolvedValue(structured);
    pipeline = new DocumentParsePipeline({
      ocrEngine: fakeEngine,
      extractor: { extract },
      images: { arrayEncoding: 'base64', keepFiles: false }
    });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('runUnified', () => {
    it('merges a directory of images into one extraction', async () => {
      const result = await pipeline.runUnified(paperDir, outDir);

      expect(extract).toHaveBeenCalledWith('# 1.png\n\n# 2.jpg');
      expect(result.markdownName).toBe('paper.md');
      expect(result.pageCount).toBe(2);
      expect(result.data).toEqual([{
        ...record,
        question_content: `![](data:image/jpeg;base64,${FIG64})`,
        question_images: [FIG64]
      }]);
      expect(result.json).toBe(JSON.stringify(result.data));
    });

    it('removes the markdown file and consumed images', async () => {
      await pipeline.runUnified(paperDir, outDir);

      expect(await fs.readdir(outDir)).toEqual(['imgs']);
      expect(await fs.readdir(path.join(outDir, 'imgs'))).toEqual([]);
    });

    it('hands a PDF to the engine as one source', async () => {
      const recognize = vi.fn<OcrEngine['recognize']>().mockResolvedValue([
        { pageIndex: 0, markdown: 'Part one', images: {}, startsParagraph: true, endsParagraph: false },
        { pageIndex: 1, markdown: 'continues', images: {}, startsParagraph: false, endsParagraph: true }
      ]);
      const pdfPipeline = new DocumentParsePipeline({
        ocrEngine: { name: 'fake', recognize },
        extractor: { extract },
        images: { arrayEncoding: 'base64', keepFiles: false }
      });
      const pdfPath = path.join(tmpDir, 'exam.pdf');
      const pdf = createTestPdf(2);
      await fs.writeFile(pdfPath, pdf);

      const result = await pdfPipeline.runUnified(pdfPath, outDir);

      expect(recognize).toHaveBeenCalledWith({ kind: 'pdf', fileName: 'exam.pdf', data: pdf });
      expect(extract).toHaveBeenCalledWith('Part one continues');
      expect(result.markdownName).toBe('exam.md');
      expect(result.pageCount).toBe(2);
    });

    it('names the markdown after the image for a one-image directory', async () => {
      const single = path.join(tmpDir, 'single');
      await fs.mkdir(single);
      await fs.writeFile(path.join(single, '1.png'), 'page');

      expect((await pipeline.runUnified(single, outDir)).markdownName).toBe('1.md');
      expect((await pipeline.runUnified(path.join(paperDir, '2.jpg'), outDir)).markdownName).toBe('2.md');
    });

    it('skips missing and unsupported entries of a list', async () => {
      const result = await pipeline.runUnified(
        [path.join(tmpDir, 'missing.png'), path.join(paperDir, '2.jpg'), path.join(paperDir, 'notes.txt')],
        outDir
      );

      expect(result.markdownName).toBe('combined.md');
      expect(result.pageCount).toBe(1);
      expect(extract).toHaveBeenCalledWith('# 2.jpg');
    });

    it('rejects lists without usable inputs', async () => {
      await expect(pipeline.runUnified([path.join(tmpDir, 'missing.png')], outDir)).rejects.toThrow('no valid inputs');
      await expect(pipeline.runUnified([path.join(paperDir, 'notes.txt')], outDir)).rejects.toThrow('no valid image or pdf content');
    });

    it('rejects bad single inputs', async () => {
      const empty = path.join(tmpDir, 'empty');
      await fs.mkdir(empty);

      await expect(pipeline.runUnified(path.join(tmpDir, 'missing.png'), outDir)).rejects.toThrow(InputNotFoundError);
      await expect(pipeline.runUnified(path.join(paperDir, 'notes.txt'), outDir)).rejects.toThrow('unsupported file type');
      await expect(pipeline.runUnified(empty, outDir)).rejects.toThrow('no images found in directory');
    });

    it('skips empty image files', async () => {
      const blank = path.join(tmpDir, 'blank.png');
      await fs.writeFile(blank, '');

      await expect(pipeline.runUnified(blank, outDir)).rejects.toThrow(PipelineInputError);
      expect(extract).not.toHaveBeenCalled();
    });

    it('inlines images into an unstructured reply', async () => {
      extract.mockResolvedValueOnce({ kind: 'raw', text: '{"question_images": ["imgs/fig.jpg"' });

      const result = await pipeline.runUnified(path.join(paperDir, '1.png'), outDir);

      expect(result.data).toBe(`{"question_images": ["${FIG64}"`);
    });
  });

  describe('processSeparately', () => {
    it('writes one JSON file beside each image and reports failures', async () => {
      extract.mockResolvedValueOnce(structured).mockRejectedValueOnce(new Error('LLM down'));

      const result = await pipeline.processSeparately(paperDir);

      expect(result).toEqual({ saved: [path.join(paperDir, '1.json')], failed: [path.join(paperDir, '2.jpg')] });
      const saved = JSON.parse(await fs.readFile(path.join(paperDir, '1.json'), 'utf-8'));
      expect(saved[0].question_images).toEqual([FIG64]);
      expect((await fs.readdir(paperDir)).filter(name => name.endsWith('.md'))).toEqual([]);
    });

    it('rejects missing paths and directories without images', async () => {
      const empty = path.join(tmpDir, 'empty');
      await fs.mkdir(empty);

      await expect(pipeline.processSeparately(path.join(tmpDir, 'nope'))).rejects.toThrow(InputNotFoundError);
      await expect(pipeline.processSeparately(empty)).rejects.toThrow('no images found in directory');
    });
  });
});
