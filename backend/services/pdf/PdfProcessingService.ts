/**
 * PdfProcessingService
 * Opens uploaded PDF buffers with mupdf (WASM, no system binaries) to count and rasterise pages.
 */

import { PipelineInputError } from '../../utils/errorHandler.js';
import { PipelineLogger } from '../../utils/LoggerUtils.js';

type MupdfModule = typeof import('mupdf');
type MupdfDocument = ReturnType<MupdfModule['Document']['openDocument']>;

export interface RenderedPage {
  pageIndex: number; // 0-based
  png: Buffer;
}

export class PdfProcessingService {

  // Loaded on first use; the WASM module is heavy
  private static async loadMupdf(): Promise<MupdfModule> {
    return import('mupdf');
  }

  private static open(mupdf: MupdfModule, pdfBuffer: Buffer, fileName: string): MupdfDocument {
    try {
      return mupdf.Document.openDocument(new Uint8Array(pdfBuffer), 'application/pdf');
    } catch (error) {
      throw new PipelineInputError(`unreadable pdf: ${fileName} (${error instanceof Error ? error.message : String(error)})`);
    }
  }

  static async countPages(pdfBuffer: Buffer, fileName = 'document.pdf'): Promise<number> {
    const mupdf = await this.loadMupdf();
    const doc = this.open(mupdf, pdfBuffer, fileName);
    try {
      return doc.countPages();
    } finally {
      doc.destroy();
    }
  }

  /**
   * Render every page to PNG at the given DPI (pdf points are 1/72 inch).
   */
  static async renderPages(pdfBuffer: Buffer, dpi: number, fileName = 'document.pdf'): Promise<RenderedPage[]> {
    const startTime = Date.now();
    const mupdf = await this.loadMupdf();
    const doc = this.open(mupdf, pdfBuffer, fileName);
    const scale = dpi / 72;
    const pages: RenderedPage[] = [];

    try {
      const pageCount = doc.countPages();
      for (let i = 0; i < pageCount; i++) {
        const page = doc.loadPage(i);
        const pixmap = page.toPixmap(mupdf.Matrix.scale(scale, scale), mupdf.ColorSpace.DeviceRGB, false);
        pages.push({ pageIndex: i, png: Buffer.from(pixmap.asPNG()) });
        pixmap.destroy();
        page.destroy();
      }
    } finally {
      doc.destroy();
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    PipelineLogger.debug('PDF PROCESSING', `Rendered ${pages.length} page(s) of ${fileName} at ${dpi} DPI in ${duration}s`);
    return pages;
  }
}

export default PdfProcessingService;
