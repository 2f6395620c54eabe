/**
 * Watch loop
 *
 * One sequential worker: capture → OCR → group → segment → per entry
 * (re-OCR, dedup check, trigger check, notify) → sleep → capture ...
 *
 * Nothing runs concurrently. A slow OCR call delays the next capture; frames
 * are never queued and missed time is never caught up. Cancellation is only
 * observed between cycles.
 *
 * Usage:
 * ```typescript
 * const controller = new AbortController();
 * await startWatch(config, {
 *   capture: new DesktopScreenCapture(),
 *   images,
 *   ocr: new TesseractOcrEngine(images),
 *   notifier: new DiscordWebhookNotifier(url),
 * }, controller.signal);
 * ```
 */

import type { WatchdogConfig } from "@/lib/config/watchdogConfig";
import type { ScreenCapture } from "@/lib/capture/screenCapture";
import type { ImageProcessor } from "@/lib/image/sharpImageProcessor";
import { cropFrame } from "@/lib/image/frame";
import { tightenToTextColumns } from "@/lib/image/textColumns";
import type { Frame, Line, OcrEngine, Rect } from "@/lib/ocr/types";
import { groupWordsIntoLines, median } from "@/lib/ocr/wordGrouper";
import {
  compileHeaderPattern,
  segmentEntries,
  selectNewestEntry,
  type Entry,
} from "@/lib/entries/entrySegmenter";
import { DedupRegistry } from "@/lib/dedup/dedupRegistry";
import { canonicalKey } from "@/lib/dedup/canonicalKey";
import { TtlSet } from "@/lib/dedup/ttlSet";
import { eventKey } from "@/lib/dedup/eventKey";
import {
  compileLegacyPatterns,
  compileTriggers,
  loadLegacyKeywords,
  type CompiledTrigger,
} from "@/lib/triggers/compileTriggers";
import { resolveTrigger, type TriggerMatch } from "@/lib/triggers/triggerResolver";
import { buildAllowedMentions, type DiscordAllowedMentions } from "@/lib/triggers/mentions";
import { formatNotification } from "@/lib/notify/formatNotification";
import type { Notifier } from "@/lib/notify/discordWebhook";
import { FatalWatchError, getErrorMessage } from "@/lib/utils/error";
import type { CaptureStore } from "./captureStore";
import type { LicenseGate } from "./licenseGate";
import { sleep as defaultSleep } from "./sleep";

const MIN_CAPTURE_SIZE = 5;
const HIT_FILENAME = "log_hit.png";

export type WatchState =
  | "idle"
  | "capturing"
  | "grouping"
  | "segmenting"
  | "reocr"
  | "dedup-check"
  | "trigger-check"
  | "notify"
  | "sleeping"
  | "stopped";

export type WatchDeps = {
  capture: ScreenCapture;
  images: ImageProcessor;
  ocr: OcrEngine;
  notifier: Notifier;
  captureStore?: CaptureStore | null;
  licenseGate?: LicenseGate | null;
  /** Milliseconds clock; Date.now by default */
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Dedup registry for this run; a fresh one by default */
  registry?: DedupRegistry;
};

export type ResolvedEntry = {
  text: string;
  confidence: number;
};

export type EntryOutcome =
  | "posted"
  | "notify-failed"
  | "duplicate"
  | "no-trigger"
  | "empty-text"
  | "no-header";

export type EntryDecision = {
  headerText: string;
  key: string | null;
  outcome: EntryOutcome;
  trigger?: string;
};

export type CycleReport = {
  frameId: number;
  ocrLines: number;
  headers: number;
  decisions: EntryDecision[];
};

/**
 * Capture rectangle from config, or a FatalWatchError when it is unset or
 * too small to hold a log line.
 */
export function requireCaptureRect(config: Pick<WatchdogConfig, "captureRect">): Rect {
  const rect = config.captureRect;
  if (!rect || rect.w < MIN_CAPTURE_SIZE || rect.h < MIN_CAPTURE_SIZE) {
    throw new FatalWatchError("Capture region not set. Set captureRect {x, y, w, h} in the config.");
  }
  return rect;
}

export class WatchLoop {
  private readonly rect: Rect;
  private readonly headerPattern: RegExp;
  private readonly triggers: CompiledTrigger[];
  private readonly legacyKeywords: string[];
  private readonly legacyPatterns: RegExp[];
  private readonly allowedMentions: DiscordAllowedMentions;
  private readonly registry: DedupRegistry;
  private readonly lineDedup: TtlSet;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private frameId = 0;
  private currentState: WatchState = "idle";

  constructor(
    private readonly config: WatchdogConfig,
    private readonly deps: WatchDeps
  ) {
    this.rect = requireCaptureRect(config);
    this.headerPattern = compileHeaderPattern(config.entryHeaderRegex);
    this.triggers = compileTriggers(config.triggers);
    this.legacyKeywords = loadLegacyKeywords(config.keywords, config.keywordsFile);
    this.legacyPatterns = compileLegacyPatterns(config.regexPatterns);
    this.allowedMentions = buildAllowedMentions(config.discordAllowedMentions);
    this.registry = deps.registry ?? new DedupRegistry();
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
    this.lineDedup = new TtlSet({
      ttlSeconds: config.lineDedupTtlSeconds,
      maxSize: config.lineDedupMaxSize,
      now: this.now,
    });
  }

  get state(): WatchState {
    return this.currentState;
  }

  get triggerCount(): number {
    return this.triggers.length;
  }

  /**
   * Run cycles until the signal aborts, keeping at least captureIntervalMs
   * between cycle starts.
   */
  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      const startedAt = this.now();
      try {
        await this.runCycle();
      } catch (error) {
        console.error(`[Watch] Cycle failed:`, getErrorMessage(error));
      }

      const elapsed = this.now() - startedAt;
      this.currentState = "sleeping";
      await this.sleep(Math.max(0, this.config.captureIntervalMs - elapsed), signal);
    }
    this.currentState = "stopped";
  }

  /**
   * One capture cycle.
   */
  async runCycle(): Promise<CycleReport> {
    const frameId = this.frameId++;
    const { images, ocr } = this.deps;

    this.currentState = "capturing";
    const region = await this.deps.capture.capture(this.rect);
    const scaled = await images.scale(region, this.config.ocrScale);
    const gray = await images.toOcrGray(scaled);
    const words = await ocr.recognize(gray, {
      psm: this.config.psmLines,
      charWhitelist: this.config.tesseractWhitelist,
    });

    this.currentState = "grouping";
    const lines = groupWordsIntoLines(words, this.config.minWordConf);
    console.log(
      `[Watch] frame ${frameId} | ocr_lines=${lines.length} | sample=${JSON.stringify(
        lines.slice(0, 5).map((l) => l.text)
      )}`
    );

    const report: CycleReport = { frameId, ocrLines: lines.length, headers: 0, decisions: [] };

    if (this.config.matchMode === "lines") {
      report.decisions = await this.processLines(lines, region);
      return report;
    }

    this.currentState = "segmenting";
    const entries = segmentEntries(lines, {
      frameWidth: gray.width,
      frameHeight: gray.height,
      headerPattern: this.headerPattern,
      padLR: this.config.entryBboxPadLr,
      padV: this.config.entryBboxPadV,
      maxHeight: this.config.entryMaxHeightPx,
    }).sort((a, b) => a.headerBox.y - b.headerBox.y);
    report.headers = entries.length;
    console.log(
      `[Watch] headers_found=${entries.length} | top=${JSON.stringify(
        entries.slice(0, 3).map((e) => e.headerText)
      )}`
    );

    const candidates = this.config.sendOnlyNewest ? selectNewestEntry(entries) : entries;
    for (const entry of candidates) {
      report.decisions.push(await this.processEntry(entry, gray, region));
    }

    return report;
  }

  /**
   * Second OCR pass over one entry's slice of the (scaled, grayscale) frame.
   * Returns null when nothing legible came back.
   */
  async resolveEntry(entry: Entry, gray: Frame): Promise<ResolvedEntry | null> {
    const box = this.config.tightenColumns
      ? tightenToTextColumns(gray, entry.box, this.config.entryBboxPadLr)
      : entry.box;
    const slice = cropFrame(gray, box);

    const words = await this.deps.ocr.recognize(slice, {
      psm: this.config.reocrPsm,
      charWhitelist: this.config.tesseractWhitelist,
    });
    const parts = groupWordsIntoLines(words, this.config.minWordConf);
    if (parts.length === 0) return null;

    const text = parts.map((p) => p.text).join(" ").trim();
    if (!text) return null;
    return { text, confidence: median(parts.map((p) => p.confidence)) };
  }

  private async processEntry(entry: Entry, gray: Frame, region: Frame): Promise<EntryDecision> {
    const decision = (outcome: EntryOutcome, key: string | null = null, trigger?: string): EntryDecision => ({
      headerText: entry.headerText,
      key,
      outcome,
      ...(trigger ? { trigger } : {}),
    });

    this.currentState = "reocr";
    const resolved = await this.resolveEntry(entry, gray);
    if (!resolved) return decision("empty-text");

    let { text } = resolved;
    if (!this.headerPattern.test(text)) {
      // The crop can cut off the header; put the first-pass header back
      const header = entry.headerText.trim();
      if (!header || !header.toLowerCase().startsWith("day")) {
        console.log(`[Watch] skip entry without recoverable header: ${JSON.stringify(text.slice(0, 60))}`);
        return decision("no-header");
      }
      text = `${header} ${text}`;
    }

    this.currentState = "dedup-check";
    const key = canonicalKey(text, entry.headerText);
    if (this.registry.has(key)) {
      console.log(`[Watch] skip duplicate header key=${key}`);
      return decision("duplicate", key);
    }

    this.currentState = "trigger-check";
    const match = resolveTrigger(text, this.triggers, this.legacyKeywords, this.legacyPatterns);
    if (!match) {
      // Not marked: a later, cleaner OCR pass of the same entry may still match
      return decision("no-trigger", key);
    }

    this.registry.mark(key);

    this.currentState = "notify";
    const sent = await this.notify(match, text, resolved.confidence, region);
    return decision(sent ? "posted" : "notify-failed", key, match.trigger.name);
  }

  private async processLines(lines: Line[], region: Frame): Promise<EntryDecision[]> {
    const decisions: EntryDecision[] = [];

    for (const line of lines) {
      this.currentState = "trigger-check";
      const match = resolveTrigger(line.text, this.triggers, this.legacyKeywords, this.legacyPatterns);
      if (!match) continue;

      this.currentState = "dedup-check";
      const key = eventKey(line.text);
      if (this.lineDedup.has(key)) {
        decisions.push({ headerText: line.text, key, outcome: "duplicate" });
        continue;
      }
      this.lineDedup.add(key);

      this.currentState = "notify";
      const sent = await this.notify(match, line.text, line.confidence, region);
      decisions.push({
        headerText: line.text,
        key,
        outcome: sent ? "posted" : "notify-failed",
        trigger: match.trigger.name,
      });
    }

    return decisions;
  }

  /**
   * Post one notification with the captured region attached when it can be
   * encoded, then archive the region. Returns whether the post succeeded.
   */
  private async notify(match: TriggerMatch, text: string, confidence: number, region: Frame): Promise<boolean> {
    const content = formatNotification({ match, text, confidence });

    let png: Buffer | null = null;
    try {
      png = await this.deps.images.encodePng(region);
    } catch (error) {
      console.warn(`[Watch] Could not encode capture, sending text only:`, getErrorMessage(error));
    }

    let sent = false;
    try {
      await this.deps.notifier.send({
        content,
        image: png,
        filename: HIT_FILENAME,
        allowedMentions: this.allowedMentions,
      });
      sent = true;
      console.log(`[OK] Posted to Discord. trigger=${match.trigger.name}`);
    } catch (error) {
      console.error(`[Watch] Notification failed:`, getErrorMessage(error));
    }

    if (png && this.config.saveCaptures && this.deps.captureStore) {
      try {
        await this.deps.captureStore.save(png, new Date(this.now()));
      } catch (error) {
        console.log(`[Watch] Capture not saved:`, getErrorMessage(error));
      }
    }

    return sent;
  }
}

/**
 * Start a watch run: check the license, validate the capture region,
 * then loop until the signal aborts.
 *
 * @throws FatalWatchError when the license is rejected or the region is unset
 */
export async function startWatch(
  config: WatchdogConfig,
  deps: WatchDeps,
  signal?: AbortSignal
): Promise<WatchLoop> {
  if (deps.licenseGate) {
    const status = await deps.licenseGate.check();
    if (!status.ok) {
      throw new FatalWatchError(`License not valid: ${status.message}`);
    }
  }

  const loop = new WatchLoop(config, deps);
  console.log(
    `[Watch] Watching region ${JSON.stringify(config.captureRect)} every ${config.captureIntervalMs} ms; ` +
      `triggers=${loop.triggerCount}; mode=${config.matchMode}`
  );
  await loop.run(signal);
  return loop;
}
