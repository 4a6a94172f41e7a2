import { PROGRESS_INTERVAL_MS } from './config.js';

const SPINNER = ['|', '/', '-', '\\'];

export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

/**
 * Terminal progress for a streamed download.
 *
 * Known length: a percentage line. Unknown length: a spinner with a byte
 * count. Either way at most one redraw per PROGRESS_INTERVAL_MS, and
 * nothing at all when the stream is not a terminal.
 */
export class DownloadProgress {
  private received = 0;
  private lastDraw = 0;
  private frame = 0;
  private readonly enabled: boolean;

  constructor(
    private readonly label: string,
    private readonly total: number | null,
    private readonly out: ProgressStream = process.stderr,
    private readonly now: () => number = Date.now,
  ) {
    this.enabled = out.isTTY === true;
  }

  update(bytes: number): void {
    this.received += bytes;
    if (!this.enabled) return;
    const t = this.now();
    if (this.lastDraw !== 0 && t - this.lastDraw < PROGRESS_INTERVAL_MS) return;
    this.lastDraw = t;
    this.draw();
  }

  finish(): void {
    if (!this.enabled) return;
    this.draw();
    this.out.write('\n');
  }

  get bytesReceived(): number {
    return this.received;
  }

  private draw(): void {
    const mb = (this.received / (1024 * 1024)).toFixed(1);
    if (this.total && this.total > 0) {
      const pct = Math.min(100, Math.floor((this.received / this.total) * 100));
      this.out.write(`\r${this.label}: ${pct}% (${mb} MB)`);
    } else {
      const glyph = SPINNER[this.frame++ % SPINNER.length];
      this.out.write(`\r${this.label}: ${glyph} ${mb} MB`);
    }
  }
}
