import { mkdir, writeFile } from "fs/promises";
import { join } from "path";

/**
 * Local archive of captured regions that produced a notification.
 */
export interface CaptureStore {
  save(png: Buffer, at: Date): Promise<string>;
}

function timestampName(at: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}-` +
    `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`
  );
}

export class FileCaptureStore implements CaptureStore {
  constructor(private readonly dir: string) {}

  async save(png: Buffer, at: Date): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const path = join(this.dir, `hit-${timestampName(at)}.png`);
    await writeFile(path, png);
    return path;
  }
}
