#!/usr/bin/env tsx
/**
 * Log watchdog entry point.
 *
 * Usage: tsx scripts/watch.ts [path/to/watchdog.config.json]
 *
 * Runs until SIGINT/SIGTERM. Exits 1 on a setup error.
 */

import {
  loadWatchdogConfig,
  getDiscordWebhookUrl,
  type WatchdogConfig,
} from "@/lib/config/watchdogConfig";
import { DesktopScreenCapture } from "@/lib/capture/screenCapture";
import { SharpImageProcessor } from "@/lib/image/sharpImageProcessor";
import { TesseractOcrEngine } from "@/lib/ocr/tesseractOcr";
import { DiscordWebhookNotifier } from "@/lib/notify/discordWebhook";
import { FileCaptureStore } from "@/lib/watch/captureStore";
import { startWatch } from "@/lib/watch/watchLoop";
import { getErrorMessage, isFatalWatchError } from "@/lib/utils/error";

async function main(): Promise<number> {
  let config: WatchdogConfig;
  try {
    config = loadWatchdogConfig(process.argv[2]);
  } catch (error) {
    console.error(`[FATAL] ${getErrorMessage(error)}`);
    return 1;
  }

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  const images = new SharpImageProcessor();
  const ocr = new TesseractOcrEngine(images, { lang: config.tesseractLang });

  try {
    await startWatch(
      config,
      {
        capture: new DesktopScreenCapture(config.captureScreen),
        images,
        ocr,
        notifier: new DiscordWebhookNotifier(getDiscordWebhookUrl(config)),
        captureStore: new FileCaptureStore(config.capturesDir),
      },
      controller.signal
    );
    console.log("[Watch] Stopped.");
    return 0;
  } catch (error) {
    if (!isFatalWatchError(error)) {
      console.error("[FATAL] Watcher crashed:", error);
    } else {
      console.error(`[FATAL] ${error.message}`);
    }
    return 1;
  } finally {
    await ocr.terminate();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`[FATAL] ${getErrorMessage(error)}`);
    process.exitCode = 1;
  }
);
