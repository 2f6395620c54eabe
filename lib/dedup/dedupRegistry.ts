/**
 * Keys of entries already reported during one watch run.
 *
 * A log record appears on screen once, so it is reported at most once per
 * run. Keys are never evicted; the registry lives as long as the run and
 * is not persisted.
 */
export class DedupRegistry {
  private readonly seen = new Set<string>();

  has(key: string): boolean {
    return this.seen.has(key);
  }

  mark(key: string): void {
    this.seen.add(key);
  }

  get size(): number {
    return this.seen.size;
  }
}
