import chalk from 'chalk';
import input from '@inquirer/input';
import confirm from '@inquirer/confirm';
import checkbox from '@inquirer/checkbox';
import { join } from 'path';
import type { DuplicateGroup, ScanOutcome } from '../types.js';
import { DuplicatesScanner, assertValidRoot, errorMessage } from '../scanners/index.js';
import { addIgnoredFolders, formatSize, loadConfig, parentFolder, toScannerOptions } from '../utils/index.js';
import { EXIT_CODES, formatReport, runScan } from './scan.js';

interface InteractiveOptions {
  config?: string;
  progress?: boolean;
}

interface FolderChoice {
  folder: string;
  size: number;
  copies: number;
}

/**
 * Folders holding duplicates, largest share first. The scan root itself is left out.
 */
export function summarizeFolders(groups: DuplicateGroup[]): FolderChoice[] {
  const byFolder = new Map<string, FolderChoice>();

  for (const group of groups) {
    for (const path of group.paths) {
      const folder = parentFolder(path);
      if (folder === '.') continue;
      const entry = byFolder.get(folder) ?? { folder, size: 0, copies: 0 };
      entry.size += group.size;
      entry.copies++;
      byFolder.set(folder, entry);
    }
  }

  return [...byFolder.values()].sort((a, b) => b.size - a.size);
}

export async function interactiveCommand(options: InteractiveOptions = {}): Promise<ScanOutcome> {
  console.log();
  console.log(chalk.bold.cyan('🔍 Duplicate File Scanner'));
  console.log(chalk.dim('─'.repeat(50)));
  console.log();

  const root = await input({
    message: 'Directory to scan:',
    default: process.cwd(),
    validate: async (value) => {
      try {
        await assertValidRoot(value);
        return true;
      } catch (error) {
        return errorMessage(error);
      }
    },
  });

  const config = await loadConfig(options.config);
  const showProgress = options.progress !== false && config.showProgress && Boolean(process.stdout.isTTY);
  const outcome = await runScan(new DuplicatesScanner(), root, toScannerOptions(config), showProgress);

  console.log();
  for (const line of formatReport(outcome)) {
    console.log(line);
  }
  console.log();

  process.exitCode = EXIT_CODES[outcome.status];
  if (outcome.status !== 'completed') {
    return outcome;
  }

  const folders = summarizeFolders(outcome.groups);
  if (folders.length === 0) {
    return outcome;
  }

  const shouldIgnore = await confirm({
    message: 'Skip any of these folders in future scans?',
    default: false,
  });
  if (!shouldIgnore) {
    return outcome;
  }

  const selected = await checkbox<string>({
    message: 'Select folders to ignore:',
    choices: folders.map((f) => ({
      name: `${f.folder.padEnd(40)} ${chalk.yellow(formatSize(f.size).padStart(10))} ${chalk.dim(`(${f.copies} files)`)}`,
      value: join(outcome.root, f.folder),
      checked: false,
    })),
    pageSize: 15,
  });

  if (selected.length > 0) {
    const added = await addIgnoredFolders(selected, options.config);
    console.log(chalk.green(`  ✓ Added ${added.length} folders to the ignore list.`));
  } else {
    console.log(chalk.dim('\nNo changes made.'));
  }

  return outcome;
}
