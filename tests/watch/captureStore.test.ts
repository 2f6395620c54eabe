import { describe, it, expect } from "vitest";
import { mkdtempSync, readFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { FileCaptureStore } from "@/lib/watch/captureStore";
import { sleep } from "@/lib/watch/sleep";

describe("FileCaptureStore", () => {
  it("writes the capture under a timestamped name, creating the directory", async () => {
    const dir = join(mkdtempSync(join(tmpdir(), "watchdog-captures-")), "captures");
    const store = new FileCaptureStore(dir);

    const path = await store.save(Buffer.from("png-bytes"), new Date(2026, 0, 2, 3, 4, 5));

    expect(path).toBe(join(dir, "hit-20260102-030405.png"));
    expect(readFileSync(path, "utf8")).toBe("png-bytes");
  });
});

describe("sleep", () => {
  it("returns at once for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();

    await sleep(60_000, controller.signal);

    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("resolves without throwing when aborted mid-wait", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });
});
