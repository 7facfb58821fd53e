import chalk from 'chalk';
import ora from 'ora';
import type { ScanOutcome, ScannerOptions } from '../types.js';
import { DuplicatesScanner } from '../scanners/index.js';
import {
  formatSize,
  loadConfig,
  toScannerOptions,
  createHashProgress,
  createConfirmProgress,
  type ProgressBar,
} from '../utils/index.js';

export interface ScanCommandOptions {
  minSize?: number;
  prefixBytes?: number;
  concurrency?: number;
  json?: boolean;
  progress?: boolean;
  verbose?: boolean;
  config?: string;
}

export const EXIT_CODES: Record<ScanOutcome['status'], number> = {
  completed: 0,
  failed: 1,
  cancelled: 130,
};

/**
 * Run a scan with terminal feedback: a spinner while counting, progress bars
 * while hashing, and Ctrl+C mapped to cooperative cancellation.
 */
export async function runScan(
  scanner: DuplicatesScanner,
  root: string,
  options: ScannerOptions,
  showProgress: boolean
): Promise<ScanOutcome> {
  const spinner = showProgress ? ora() : null;
  const bars: { hash?: ProgressBar; confirm?: ProgressBar } = {};
  let interrupted = false;

  const onSigint = (): void => {
    if (interrupted) {
      process.exit(EXIT_CODES.cancelled);
    }
    interrupted = true;
    spinner?.stop();
    bars.hash?.finish();
    bars.confirm?.finish();
    console.log(chalk.yellow('\nCancelling after the current file... (Ctrl+C again to quit)'));
    scanner.cancel();
  };

  process.on('SIGINT', onSigint);

  try {
    return await scanner.scan(root, {
      ...options,
      onStateChange: (state) => {
        options.onStateChange?.(state);
        if (!spinner || interrupted) return;
        if (state === 'counting') {
          spinner.start('Indexing files...');
        } else if (state === 'hashing') {
          spinner.succeed(`Indexed ${scanner.progress.total} files`);
          bars.hash = createHashProgress(scanner.progress.total);
        } else if (state === 'confirming') {
          bars.hash?.finish();
        } else if (state === 'ranking') {
          bars.confirm?.finish();
        }
      },
      onProgress: (processed, total) => {
        options.onProgress?.(processed, total);
        if (!interrupted) bars.hash?.update(processed, undefined, total);
      },
      onConfirmProgress: (processed, total) => {
        options.onConfirmProgress?.(processed, total);
        if (!spinner || interrupted) return;
        const bar = (bars.confirm ??= createConfirmProgress(total));
        bar.update(processed);
      },
    });
  } finally {
    process.off('SIGINT', onSigint);
    spinner?.stop();
    bars.hash?.finish();
    bars.confirm?.finish();
  }
}

export function formatReport(outcome: ScanOutcome): string[] {
  const lines: string[] = [];

  if (outcome.status === 'failed') {
    lines.push(chalk.red(`✗ ${outcome.error.message}`));
    return lines;
  }

  if (outcome.status === 'cancelled') {
    lines.push(chalk.yellow('Scan cancelled. No results were kept.'));
  } else if (outcome.groups.length === 0) {
    lines.push(chalk.green(`✓ No duplicate files found in ${outcome.stats.filesScanned} files.`));
  } else {
    lines.push(chalk.bold(`Duplicate files in ${outcome.root}:`));
    lines.push('');
    for (const group of outcome.groups) {
      lines.push(`${chalk.yellow(formatSize(group.size).padStart(10))}  ${chalk.dim(`${group.paths.length} copies`)}`);
      for (const path of group.paths) {
        lines.push(`            ${path}`);
      }
    }
    lines.push('');
    lines.push(chalk.dim('─'.repeat(50)));
    lines.push(
      `Found ${chalk.bold(String(outcome.stats.duplicateGroups))} groups ` +
        `(${outcome.stats.duplicateFiles} files), ` +
        `${chalk.green(formatSize(outcome.stats.wastedBytes))} reclaimable`
    );
  }

  if (outcome.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow(`⚠ ${outcome.warnings.length} files or folders could not be read:`));
    for (const warning of outcome.warnings) {
      lines.push(chalk.dim(`  ${warning.path}: ${warning.message}`));
    }
  }

  return lines;
}

export async function scanCommand(dir: string, options: ScanCommandOptions = {}): Promise<ScanOutcome> {
  const config = await loadConfig(options.config);
  const scannerOptions: ScannerOptions = {
    ...toScannerOptions(config),
    verbose: options.verbose,
  };
  if (options.minSize !== undefined) scannerOptions.minSize = options.minSize;
  if (options.prefixBytes !== undefined) scannerOptions.prefixBytes = options.prefixBytes;
  if (options.concurrency !== undefined) scannerOptions.concurrency = options.concurrency;

  const showProgress =
    options.progress !== false && config.showProgress && !options.json && Boolean(process.stdout.isTTY);

  const outcome = await runScan(new DuplicatesScanner(), dir, scannerOptions, showProgress);

  if (options.json) {
    console.log(JSON.stringify(outcome, null, 2));
  } else {
    console.log();
    for (const line of formatReport(outcome)) {
      console.log(line);
    }
    console.log();
  }

  process.exitCode = EXIT_CODES[outcome.status];
  return outcome;
}
