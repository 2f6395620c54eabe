import { setTimeout as delay } from "timers/promises";

/**
 * Wait ms milliseconds. Resolves early, without throwing, when the signal aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
}
