import type { OcrPage, OcrSource } from '../../types/index.js';

/**
 * A page recogniser: one OcrPage per image, or per page of a PDF, in reading order.
 */
export interface OcrEngine {
  readonly name: string;
  recognize(source: OcrSource): Promise<OcrPage[]>;
}
