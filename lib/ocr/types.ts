/**
 * Shared geometry and OCR result types.
 *
 * All coordinates are integer pixels in the image that produced them
 * (top-left origin). Boxes from the first OCR pass live in the scaled
 * capture, so they can be used directly to crop that same image.
 */

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/**
 * Raw pixels, interleaved. Colour frames are RGB (3 channels), grayscale
 * frames have 1 channel.
 */
export interface Frame {
  data: Buffer;
  width: number;
  height: number;
  channels: 1 | 3 | 4;
}

/**
 * One recognized word from the OCR engine's TSV output.
 * confidence is 0..100, or -1 when the engine did not report one.
 */
export interface Word {
  text: string;
  confidence: number;
  box: Rect;
  page: number;
  block: number;
  paragraph: number;
  lineIndex: number;
  wordIndex: number;
}

export interface Line {
  text: string;
  confidence: number;
  box: Rect;
}

export type OcrPassConfig = {
  psm: number;
  charWhitelist: string;
};

/**
 * OCR collaborator. Implementations receive an already scaled and
 * preprocessed frame and return every word they found, unfiltered.
 */
export interface OcrEngine {
  recognize(frame: Frame, config: OcrPassConfig): Promise<Word[]>;
}
