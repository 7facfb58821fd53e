import chalk from 'chalk';

export interface ProgressOptions {
  total: number;
  label?: string;
  showPercentage?: boolean;
  showCount?: boolean;
  barWidth?: number;
  stream?: NodeJS.WritableStream;
}

const RENDER_INTERVAL_MS = 50;

export class ProgressBar {
  private current = 0;
  private total: number;
  private label: string;
  private showPercentage: boolean;
  private showCount: boolean;
  private barWidth: number;
  private stream: NodeJS.WritableStream;
  private startTime = Date.now();
  private lastRender = 0;

  constructor(options: ProgressOptions) {
    this.total = Math.max(0, options.total);
    this.label = options.label ?? '';
    this.showPercentage = options.showPercentage ?? true;
    this.showCount = options.showCount ?? true;
    this.barWidth = options.barWidth ?? 30;
    this.stream = options.stream ?? process.stdout;
  }

  update(current: number, label?: string, total?: number): void {
    this.current = current;
    if (label !== undefined) this.label = label;
    if (total !== undefined) this.total = total;

    const now = Date.now();
    if (now - this.lastRender < RENDER_INTERVAL_MS && current < this.total) return;
    this.lastRender = now;
    this.render();
  }

  increment(label?: string): void {
    this.update(this.current + 1, label);
  }

  private render(): void {
    const ratio = this.total > 0 ? Math.min(1, this.current / this.total) : 0;
    const filled = Math.round(ratio * this.barWidth);
    const bar = chalk.cyan('█'.repeat(filled)) + chalk.dim('░'.repeat(this.barWidth - filled));

    const parts = [bar];
    if (this.showPercentage) parts.push(`${Math.round(ratio * 100)}%`.padStart(4));
    if (this.showCount) parts.push(chalk.dim(`(${this.current}/${this.total})`));
    parts.push(chalk.dim(`${Math.floor((Date.now() - this.startTime) / 1000)}s`));
    if (this.label) parts.push(this.label);

    this.stream.write(`\r\x1b[K${parts.join(' ')}`);
  }

  finish(message?: string): void {
    this.stream.write('\r\x1b[K');
    if (message) {
      this.stream.write(`${message}\n`);
    }
  }
}

export function createHashProgress(total: number): ProgressBar {
  return new ProgressBar({ total, label: 'Hashing file prefixes...' });
}

export function createConfirmProgress(total: number): ProgressBar {
  return new ProgressBar({ total, label: 'Rechecking candidates...' });
}
