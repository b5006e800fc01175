import { DEFAULT_TAIL_LINES, DEFAULT_TAIL_MAX_BYTES } from "./protocol.js";

/**
 * Recent engine output kept for failure diagnostics, bounded by line count
 * and by total characters.
 */
export class OutputTail {
  private readonly entries: string[] = [];
  private bytes = 0;

  constructor(
    private readonly maxLines: number = DEFAULT_TAIL_LINES,
    private readonly maxBytes: number = DEFAULT_TAIL_MAX_BYTES,
  ) {}

  push(line: string): void {
    this.entries.push(line);
    this.bytes += line.length;

    // Trim oldest entries if over limit
    while (
      (this.entries.length > this.maxLines || this.bytes > this.maxBytes) &&
      this.entries.length > 1
    ) {
      const removed = this.entries.shift();
      if (removed !== undefined) {
        this.bytes -= removed.length;
      }
    }
  }

  lines(count?: number): string[] {
    if (count === undefined || count >= this.entries.length) {
      return [...this.entries];
    }
    if (count <= 0) {
      return [];
    }
    return this.entries.slice(this.entries.length - count);
  }

  clear(): void {
    this.entries.length = 0;
    this.bytes = 0;
  }

  get length(): number {
    return this.entries.length;
  }
}
