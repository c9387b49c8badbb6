import type { ProgressSink } from '../pipeline/progress';

export interface ProgressOutput {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

/**
 * Single-line progress bar on stderr. Redraws are throttled; the final
 * state is always drawn on close.
 */
export class TerminalProgressBar implements ProgressSink {
  private total = 0;
  private done = 0;
  private label = '';
  private startTime = 0;
  private lastUpdate = 0;
  private active = false;
  private readonly updateInterval = 100; // ms

  constructor(private readonly stream: ProgressOutput = process.stderr) {}

  start(total: number, label: string): void {
    this.total = total;
    this.done = 0;
    this.label = label;
    this.startTime = Date.now();
    this.lastUpdate = 0;
    this.active = true;
    this.render(true);
  }

  advance(n: number): void {
    if (!this.active) return;
    this.done = Math.min(this.total, this.done + n);
    this.render(false);
  }

  close(): void {
    if (!this.active) return;
    this.render(true);
    if (this.stream.isTTY) this.stream.write('\n');
    this.active = false;
  }

  private render(force: boolean): void {
    const now = Date.now();
    if (!force && now - this.lastUpdate < this.updateInterval) {
      return;
    }
    this.lastUpdate = now;

    const percentage = this.total > 0 ? Math.round((this.done / this.total) * 100) : 100;
    const elapsed = this.formatTime((now - this.startTime) / 1000);
    const line = `${this.label}: ${String(percentage).padStart(3)}% ${this.createBar(percentage)} ${elapsed}`;

    if (this.stream.isTTY) {
      this.stream.write(`\r\x1b[2K${line}`);
    } else if (force) {
      this.stream.write(`${line}\n`);
    }
  }

  private createBar(percentage: number): string {
    const width = 30;
    const filled = Math.round((width * percentage) / 100);
    return `|${'█'.repeat(filled)}${'░'.repeat(width - filled)}|`;
  }

  private formatTime(seconds: number): string {
    const minutes = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);
    return `${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
  }
}
