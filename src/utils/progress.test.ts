import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { PassThrough } from 'stream';
import { ProgressBar } from './progress.js';

function capture(): { stream: PassThrough; writes: string[] } {
  const stream = new PassThrough();
  const writes: string[] = [];
  vi.spyOn(stream, 'write').mockImplementation((chunk: unknown) => {
    writes.push(String(chunk));
    return true;
  });
  return { stream, writes };
}

describe('ProgressBar', () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
    vi.useFakeTimers();
  });

  afterEach(() => {
    chalk.level = level;
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should draw the bar with percentage, count and label', () => {
    const { stream, writes } = capture();
    const bar = new ProgressBar({ total: 4, barWidth: 4, label: 'Hashing', stream });

    bar.update(1);

    expect(writes).toEqual(['\r\x1b[K█░░░  25% (1/4) 0s Hashing']);
  });

  it('should throttle redraws but always draw the last step', () => {
    const { stream, writes } = capture();
    const bar = new ProgressBar({ total: 4, barWidth: 4, stream });

    bar.update(1);
    bar.update(2);
    bar.update(3);
    bar.update(4);

    expect(writes).toEqual(['\r\x1b[K█░░░  25% (1/4) 0s', '\r\x1b[K████ 100% (4/4) 0s']);
  });

  it('should let the total grow', () => {
    const { stream, writes } = capture();
    const bar = new ProgressBar({ total: 2, barWidth: 2, showPercentage: false, stream });

    bar.update(3, undefined, 3);

    expect(writes).toEqual(['\r\x1b[K██ (3/3) 0s']);
  });

  it('should clear the line when finished', () => {
    const { stream, writes } = capture();
    const bar = new ProgressBar({ total: 1, stream });

    bar.finish('Done');

    expect(writes).toEqual(['\r\x1b[K', 'Done\n']);
  });
});
