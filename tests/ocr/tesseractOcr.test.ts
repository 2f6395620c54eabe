/**
 * tesseract.js adapter tests
 *
 * The worker is replaced with a fake; these check what the adapter hands
 * to tesseract.js (language data, PSM, whitelist) and how it handles a
 * worker that fails to start.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { join } from "path";
import { OEM, PSM } from "tesseract.js";
import { resolveLangPath, TesseractOcrEngine, toPageSegMode } from "@/lib/ocr/tesseractOcr";
import type { ImageProcessor } from "@/lib/image/sharpImageProcessor";
import type { Frame } from "@/lib/ocr/types";

const { createWorker } = vi.hoisted(() => ({ createWorker: vi.fn() }));

vi.mock("tesseract.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("tesseract.js")>();
  return { ...actual, createWorker };
});

const PNG = Buffer.from("png-bytes");
const LANG_PATH = "/data/tessdata";

const TSV = [
  "level\tpage_num\tblock_num\tpar_num\tline_num\tword_num\tleft\ttop\twidth\theight\tconf\ttext",
  "5\t1\t1\t1\t1\t1\t12\t8\t44\t22\t95.5\tDay",
].join("\n");

const frame: Frame = { data: Buffer.alloc(4), width: 2, height: 2, channels: 1 };

const images: ImageProcessor = {
  scale: async (f) => f,
  toOcrGray: async (f) => f,
  encodePng: async () => PNG,
};

function fakeWorker() {
  return {
    setParameters: vi.fn(async () => ({})),
    recognize: vi.fn(async () => ({ data: { tsv: TSV } })),
    terminate: vi.fn(async () => ({})),
  };
}

beforeEach(() => {
  createWorker.mockReset();
});

describe("toPageSegMode", () => {
  it("maps Tesseract PSM numbers", () => {
    expect(toPageSegMode(6)).toBe(PSM.SINGLE_BLOCK);
    expect(toPageSegMode(11)).toBe(PSM.SPARSE_TEXT);
  });

  it("falls back to a single block for unknown numbers", () => {
    expect(toPageSegMode(42)).toBe(PSM.SINGLE_BLOCK);
  });
});

describe("resolveLangPath", () => {
  it("points at the model directory of the installed language package", () => {
    expect(resolveLangPath("eng")).toMatch(/[\\/]@tesseract\.js-data[\\/]eng[\\/]4\.0\.0_best_int$/);
  });

  it("uses the first language of a combined spec", () => {
    expect(resolveLangPath("eng+deu")).toBe(resolveLangPath("eng"));
  });

  it("names the package to install for a missing language", () => {
    expect(() => resolveLangPath("zzz")).toThrow('Language data for "zzz" is not installed');
  });
});

describe("TesseractOcrEngine", () => {
  it("starts the worker from local language data", async () => {
    createWorker.mockResolvedValue(fakeWorker());
    const engine = new TesseractOcrEngine(images, { lang: "eng", langPath: LANG_PATH });

    await engine.recognize(frame, { psm: 6, charWhitelist: "" });

    expect(createWorker).toHaveBeenCalledWith("eng", OEM.LSTM_ONLY, {
      langPath: LANG_PATH,
      gzip: true,
      cacheMethod: "none",
    });
  });

  it("uses the installed language package by default", async () => {
    createWorker.mockResolvedValue(fakeWorker());
    const engine = new TesseractOcrEngine(images);

    await engine.recognize(frame, { psm: 6, charWhitelist: "" });

    expect(createWorker.mock.calls[0][2]).toMatchObject({ langPath: resolveLangPath("eng") });
  });

  it("applies PSM and the unquoted whitelist, then parses the TSV", async () => {
    const worker = fakeWorker();
    createWorker.mockResolvedValue(worker);
    const engine = new TesseractOcrEngine(images, { langPath: LANG_PATH });

    const words = await engine.recognize(frame, { psm: 11, charWhitelist: ' "0123456789:," ' });

    expect(worker.setParameters).toHaveBeenCalledWith({
      tessedit_pageseg_mode: PSM.SPARSE_TEXT,
      tessedit_char_whitelist: "0123456789:,",
      preserve_interword_spaces: "1",
    });
    expect(worker.recognize).toHaveBeenCalledWith(PNG, {}, { tsv: true });
    expect(words).toEqual([
      {
        text: "Day",
        confidence: 95,
        box: { x: 12, y: 8, w: 44, h: 22 },
        page: 1,
        block: 1,
        paragraph: 1,
        lineIndex: 1,
        wordIndex: 1,
      },
    ]);
  });

  it("reuses one worker across calls", async () => {
    createWorker.mockResolvedValue(fakeWorker());
    const engine = new TesseractOcrEngine(images, { langPath: LANG_PATH });

    await engine.recognize(frame, { psm: 6, charWhitelist: "" });
    await engine.recognize(frame, { psm: 7, charWhitelist: "" });

    expect(createWorker).toHaveBeenCalledTimes(1);
  });

  it("starts a new worker on the next call after a failed start", async () => {
    const worker = fakeWorker();
    createWorker.mockRejectedValueOnce(new Error("traineddata download failed")).mockResolvedValueOnce(worker);
    const engine = new TesseractOcrEngine(images, { langPath: LANG_PATH });

    await expect(engine.recognize(frame, { psm: 6, charWhitelist: "" })).rejects.toThrow(
      "traineddata download failed"
    );
    const words = await engine.recognize(frame, { psm: 6, charWhitelist: "" });

    expect(createWorker).toHaveBeenCalledTimes(2);
    expect(words.map((w) => w.text)).toEqual(["Day"]);
  });

  it("terminates a started worker once", async () => {
    const worker = fakeWorker();
    createWorker.mockResolvedValue(worker);
    const engine = new TesseractOcrEngine(images, { langPath: LANG_PATH });
    await engine.recognize(frame, { psm: 6, charWhitelist: "" });

    await engine.terminate();
    await engine.terminate();

    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });

  it("has nothing to terminate when no worker was started", async () => {
    const engine = new TesseractOcrEngine(images, { langPath: LANG_PATH });
    await expect(engine.terminate()).resolves.toBeUndefined();
    expect(createWorker).not.toHaveBeenCalled();
  });
});
