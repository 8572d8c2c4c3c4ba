import { describe, it, expect, vi } from 'vitest';
import { loadPipelineConfig, type PipelineConfig } from '../config/pipeline.js';
import { createOcrEngine, PaddleOcrVlService, VisionLlmOcrService } from '../services/ocr/index.js';
import type { ChatClient } from '../services/llm/ChatClient.js';
import { OcrServiceError } from '../utils/errorHandler.js';
import { createTestPdf } from './helpers/testPdf.js';

const ocrConfig: PipelineConfig['ocr'] = {
  engine: 'paddle-vl',
  serviceUrl: 'http://ocr.test',
  timeoutMs: 1000,
  maxRetries: 2,
  useDocOrientationClassify: true,
  useDocUnwarping: false,
  visionModel: 'test-vision',
  pdfDpi: 150
};

const okResponse = {
  data: {
    errorCode: 0,
    errorMsg: 'Success',
    result: {
      layoutParsingResults: [
        {
          markdown: {
            text: '# Page 1',
            images: { 'imgs/a.jpg': Buffer.from('AAA').toString('base64') },
            isStart: true,
            isEnd: false
          }
        },
        { markdown: { text: 'continued', isStart: false, isEnd: true } }
      ]
    }
  }
};

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe('PaddleOcrVlService', () => {
  it('posts the file to the layout-parsing endpoint and maps pages', async () => {
    const post = vi.fn().mockResolvedValue(okResponse);
    const service = new PaddleOcrVlService(ocrConfig, post, 1);
    const data = Buffer.from('%PDF-1.7');

    const pages = await service.recognize({ kind: 'pdf', fileName: 'paper.pdf', data });

    expect(post).toHaveBeenCalledWith(
      'http://ocr.test/layout-parsing',
      {
        file: data.toString('base64'),
        fileType: 0,
        useDocOrientationClassify: true,
        useDocUnwarping: false,
        visualize: false
      },
      { timeout: 1000 }
    );
    expect(pages).toHaveLength(2);
    expect(pages[0].markdown).toBe('# Page 1');
    expect(pages[0].images['imgs/a.jpg'].toString()).toBe('AAA');
    expect(pages[0].endsParagraph).toBe(false);
    expect(pages[1]).toEqual({ pageIndex: 1, markdown: 'continued', images: {}, startsParagraph: false, endsParagraph: true });
  });

  it('sends images with file type 1', async () => {
    const post = vi.fn().mockResolvedValue(okResponse);

    await new PaddleOcrVlService(ocrConfig, post, 1).recognize({ kind: 'image', fileName: 'scan.png', data: Buffer.from('png') });

    expect(post.mock.calls[0][1].fileType).toBe(1);
  });

  it('raises the service error code', async () => {
    const post = vi.fn().mockResolvedValue({ data: { errorCode: 500, errorMsg: 'Internal', result: null } });

    await expect(new PaddleOcrVlService(ocrConfig, post, 1).recognize({ kind: 'image', fileName: 'scan.png', data: Buffer.from('x') }))
      .rejects.toThrow('OCR service error 500 for scan.png: Internal');
  });

  it('rejects malformed bodies', async () => {
    const post = vi.fn().mockResolvedValue({ data: 'oops' });

    await expect(new PaddleOcrVlService(ocrConfig, post, 1).recognize({ kind: 'image', fileName: 'scan.png', data: Buffer.from('x') }))
      .rejects.toThrow(OcrServiceError);
  });

  it('retries a temporarily unavailable service', async () => {
    const post = vi.fn()
      .mockRejectedValueOnce(httpError('Service Unavailable', 503))
      .mockResolvedValueOnce(okResponse);

    const pages = await new PaddleOcrVlService(ocrConfig, post, 1).recognize({ kind: 'image', fileName: 'scan.png', data: Buffer.from('x') });

    expect(post).toHaveBeenCalledTimes(2);
    expect(pages).toHaveLength(2);
  });

  it('wraps a non-retryable failure with its status', async () => {
    const post = vi.fn().mockRejectedValue(httpError('Unauthorized', 401));

    const failure = new PaddleOcrVlService(ocrConfig, post, 1).recognize({ kind: 'image', fileName: 'scan.png', data: Buffer.from('x') });

    await expect(failure).rejects.toMatchObject({
      name: 'OcrServiceError',
      message: 'OCR request for scan.png failed: Unauthorized',
      status: 401
    });
    expect(post).toHaveBeenCalledTimes(1);
  });
});

describe('VisionLlmOcrService', () => {
  it('transcribes an image and unwraps a markdown fence', async () => {
    const complete = vi.fn().mockResolvedValue('```markdown\n# Page\n```');
    const client: ChatClient = { complete };
    const service = new VisionLlmOcrService(client, ocrConfig);
    const data = Buffer.from('not an image');

    const pages = await service.recognize({ kind: 'image', fileName: 'scan.png', data });

    expect(pages).toEqual([{ pageIndex: 0, markdown: '# Page', images: {}, startsParagraph: true, endsParagraph: true }]);
    const request = complete.mock.calls[0][0];
    expect(request.model).toBe('test-vision');
    expect(request.messages[1].content[0].image_url.url).toBe(`data:image/png;base64,${data.toString('base64')}`);
  });

  it('renders each PDF page and transcribes them in order', async () => {
    const complete = vi.fn()
      .mockResolvedValueOnce('# Page one')
      .mockResolvedValueOnce('# Page two');
    const client: ChatClient = { complete };
    const service = new VisionLlmOcrService(client, { ...ocrConfig, pdfDpi: 72 });

    const pages = await service.recognize({ kind: 'pdf', fileName: 'exam.pdf', data: createTestPdf(2) });

    expect(pages.map(page => [page.pageIndex, page.markdown])).toEqual([[0, '# Page one'], [1, '# Page two']]);
    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[0][0].messages[1].content[0].image_url.url).toMatch(/^data:image\/jpeg;base64,/);
  });
});

describe('createOcrEngine', () => {
  it('picks the engine named in the configuration', () => {
    expect(createOcrEngine(loadPipelineConfig({})).name).toBe('paddle-vl');
    expect(createOcrEngine(loadPipelineConfig({ OCR_ENGINE: 'vision-llm' }))).toBeInstanceOf(VisionLlmOcrService);
  });
});
