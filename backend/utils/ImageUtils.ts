import sharp from 'sharp';
import { PipelineLogger } from './LoggerUtils.js';

const DATA_URL_PATTERN = /^data:([^;,]+);base64,/i;

/**
 * ImageUtils - encoding helpers for page images and embedded region images
 */
export class ImageUtils {

  static toDataUrl(buffer: Buffer, mime: string): string {
    return `data:${mime};base64,${buffer.toString('base64')}`;
  }

  /**
   * Decode either a data URL or a bare Base64 payload.
   */
  static decodeBase64(imageData: string): Buffer {
    const trimmed = imageData.trim();
    const match = trimmed.match(DATA_URL_PATTERN);
    const payload = match ? trimmed.slice(match[0].length) : trimmed;
    return Buffer.from(payload.replace(/\s+/g, ''), 'base64');
  }

  static mimeOfDataUrl(imageData: string): string | undefined {
    return imageData.trim().match(DATA_URL_PATTERN)?.[1]?.toLowerCase();
  }

  /**
   * Normalizes orientation from EXIF data, bounds the longest side and re-encodes as JPEG
   * for vision-model transcription. Falls back to the original bytes when sharp cannot
   * decode the format.
   */
  static async prepareForVision(imageBuffer: Buffer, fallbackMime: string, maxSide = 2048): Promise<string> {
    try {
      const normalized = await sharp(imageBuffer)
        .rotate()
        .resize({ width: maxSide, height: maxSide, fit: 'inside', withoutEnlargement: true })
        .jpeg({ quality: 90, progressive: true })
        .toBuffer();
      return this.toDataUrl(normalized, 'image/jpeg');
    } catch (error) {
      PipelineLogger.warn('IMAGE UTILS', `Could not normalize image, sending original bytes (${error instanceof Error ? error.message : String(error)})`);
      return this.toDataUrl(imageBuffer, fallbackMime);
    }
  }

  /**
   * Re-encode arbitrary image bytes as JPEG.
   */
  static async toJpeg(imageBuffer: Buffer, quality = 90): Promise<Buffer> {
    return sharp(imageBuffer).jpeg({ quality }).toBuffer();
  }
}
