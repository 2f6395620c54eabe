/**
 * tesseract.js OCR backend.
 *
 * Frames are encoded to PNG and recognized with TSV output, which carries
 * the per-word page/block/paragraph/line indices the grouper relies on.
 * One worker is created lazily and reused for every call. Language data is
 * read from the installed @tesseract.js-data/<lang> package, never fetched.
 */

import { createRequire } from "module";
import { dirname, join } from "path";
import { createWorker, OEM, PSM, type Worker } from "tesseract.js";
import type { ImageProcessor } from "@/lib/image/sharpImageProcessor";
import type { Frame, OcrEngine, OcrPassConfig, Word } from "./types";
import { parseTesseractTsv } from "./tsv";

const PSM_BY_NUMBER: Record<number, PSM> = {
  0: PSM.OSD_ONLY,
  1: PSM.AUTO_OSD,
  2: PSM.AUTO_ONLY,
  3: PSM.AUTO,
  4: PSM.SINGLE_COLUMN,
  5: PSM.SINGLE_BLOCK_VERT_TEXT,
  6: PSM.SINGLE_BLOCK,
  7: PSM.SINGLE_LINE,
  8: PSM.SINGLE_WORD,
  9: PSM.CIRCLE_WORD,
  10: PSM.SINGLE_CHAR,
  11: PSM.SPARSE_TEXT,
  12: PSM.SPARSE_TEXT_OSD,
  13: PSM.RAW_LINE,
};

// Model directory inside each @tesseract.js-data/<lang> package
const TRAINEDDATA_DIR = "4.0.0_best_int";

const requireFromHere = createRequire(import.meta.url);

export function toPageSegMode(psm: number): PSM {
  return PSM_BY_NUMBER[psm] ?? PSM.SINGLE_BLOCK;
}

/**
 * Directory holding <lang>.traineddata.gz from the installed language
 * package. Multi-language specs ("eng+deu") must come from one directory,
 * so the first language's package is used.
 */
export function resolveLangPath(lang: string): string {
  const primary = lang.split("+")[0].trim() || "eng";
  let packageJson: string;
  try {
    packageJson = requireFromHere.resolve(`@tesseract.js-data/${primary}/package.json`);
  } catch (error) {
    throw new Error(
      `Language data for "${primary}" is not installed (npm install @tesseract.js-data/${primary})`,
      { cause: error }
    );
  }
  return join(dirname(packageJson), TRAINEDDATA_DIR);
}

export type TesseractOcrOptions = {
  lang?: string;
  /** Directory with gzipped traineddata; the installed language package by default */
  langPath?: string;
};

export class TesseractOcrEngine implements OcrEngine {
  private worker: Promise<Worker> | null = null;
  private readonly lang: string;
  private readonly langPath: string | undefined;

  constructor(
    private readonly images: ImageProcessor,
    options: TesseractOcrOptions = {}
  ) {
    this.lang = options.lang ?? "eng";
    this.langPath = options.langPath;
  }

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      const langPath = this.langPath ?? resolveLangPath(this.lang);
      // A failed start is not cached; the next call tries again
      this.worker = createWorker(this.lang, OEM.LSTM_ONLY, {
        langPath,
        gzip: true,
        cacheMethod: "none",
      }).catch((error: unknown) => {
        this.worker = null;
        throw error;
      });
    }
    return this.worker;
  }

  async recognize(frame: Frame, config: OcrPassConfig): Promise<Word[]> {
    const worker = await this.getWorker();
    // Quotes would break the whitelist parameter
    const whitelist = config.charWhitelist.trim().replace(/"/g, "");

    await worker.setParameters({
      tessedit_pageseg_mode: toPageSegMode(config.psm),
      tessedit_char_whitelist: whitelist,
      preserve_interword_spaces: "1",
    });

    const png = await this.images.encodePng(frame);
    const { data } = await worker.recognize(png, {}, { tsv: true });
    return parseTesseractTsv(data.tsv ?? "");
  }

  async terminate(): Promise<void> {
    const pending = this.worker;
    if (!pending) return;
    this.worker = null;
    // A worker that never started was already reported by the failing recognize()
    const worker = await pending.catch(() => null);
    if (worker) await worker.terminate();
  }
}
