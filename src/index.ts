#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { scanCommand, type ScanCommandOptions } from './commands/scan.js';
import { interactiveCommand } from './commands/interactive.js';
import { serveCommand } from './commands/serve.js';
import { errorMessage } from './scanners/index.js';
import { initConfig, parseSize } from './utils/index.js';

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function byteSize(value: string): number {
  try {
    return parseSize(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

const program = new Command();

program
  .name('dupescan')
  .description('Find duplicate files in a directory tree by content')
  .version('1.0.0');

program
  .command('scan')
  .description('Scan a directory and list groups of identical files')
  .argument('<dir>', 'directory to scan')
  .option('-m, --min-size <size>', 'ignore duplicates smaller than this (e.g. 1MB)', byteSize)
  .option('--prefix-bytes <n>', 'bytes read by the first hashing pass', positiveInteger)
  .option('-j, --concurrency <n>', 'files hashed in parallel', positiveInteger)
  .option('--json', 'print the result as JSON')
  .option('--no-progress', 'do not show progress bars')
  .option('-v, --verbose', 'log each stage')
  .option('-c, --config <path>', 'configuration file')
  .action(async (dir: string, options: ScanCommandOptions) => {
    await scanCommand(dir, options);
  });

program
  .command('interactive', { isDefault: true })
  .description('Choose a directory, scan it and manage ignored folders')
  .option('--no-progress', 'do not show progress bars')
  .option('-c, --config <path>', 'configuration file')
  .action(async (options: { progress?: boolean; config?: string }) => {
    await interactiveCommand(options);
  });

program
  .command('serve')
  .description('Start the HTTP API for scans')
  .option('-p, --port <port>', 'port to listen on', positiveInteger)
  .option('-c, --config <path>', 'configuration file')
  .action(async (options: { port?: number; config?: string }) => {
    await serveCommand(options);
  });

program
  .command('config')
  .description('Manage the configuration file')
  .option('--init', 'write a configuration file with the defaults')
  .option('-c, --config <path>', 'configuration file')
  .action(async (options: { init?: boolean; config?: string }) => {
    if (!options.init) {
      program.commands.find((cmd) => cmd.name() === 'config')?.help();
      return;
    }
    const path = await initConfig(options.config);
    console.log(chalk.green(`✓ Wrote ${path}`));
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`✗ ${errorMessage(error)}`));
  process.exitCode = 1;
});
