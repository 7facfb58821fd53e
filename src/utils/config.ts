import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { homedir } from 'os';
import type { ScannerOptions } from '../types.js';
import { exists } from './fs.js';

const CONFIG_PATHS = [
  join(homedir(), '.dupescanrc'),
  join(homedir(), '.config', 'dupescan', 'config.json'),
];

export interface Config {
  prefixBytes: number;
  minSize: number;
  concurrency: number;
  showProgress: boolean;
  ignoredFolders: string[];   // Skipped directory trees (absolute paths)
  ignoredPaths: string[];     // Skipped files (absolute paths)
  serverPort: number;
}

const DEFAULT_CONFIG: Config = {
  prefixBytes: 8 ** 6,
  minSize: 0,
  concurrency: 1,
  showProgress: true,
  ignoredFolders: [],
  ignoredPaths: [],
  serverPort: 3000,
};

let cachedConfig: Config | null = null;

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function getDefaultConfig(): Config {
  return { ...DEFAULT_CONFIG, ignoredFolders: [], ignoredPaths: [] };
}

function positiveInteger(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * Merge parsed JSON over the defaults, dropping values of the wrong shape.
 */
export function normalizeConfig(raw: unknown): Config {
  const defaults = getDefaultConfig();
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return defaults;
  }

  const source: Record<string, unknown> = { ...raw };
  return {
    prefixBytes: positiveInteger(source.prefixBytes, defaults.prefixBytes),
    minSize: typeof source.minSize === 'number' && source.minSize >= 0 ? source.minSize : defaults.minSize,
    concurrency: positiveInteger(source.concurrency, defaults.concurrency),
    showProgress: typeof source.showProgress === 'boolean' ? source.showProgress : defaults.showProgress,
    ignoredFolders: stringList(source.ignoredFolders),
    ignoredPaths: stringList(source.ignoredPaths),
    serverPort: positiveInteger(source.serverPort, defaults.serverPort),
  };
}

export async function loadConfig(configPath?: string): Promise<Config> {
  if (cachedConfig && !configPath) {
    return cachedConfig;
  }

  const paths = configPath ? [configPath] : CONFIG_PATHS;

  for (const path of paths) {
    if (!(await exists(path))) continue;
    try {
      const content = await readFile(path, 'utf-8');
      cachedConfig = normalizeConfig(JSON.parse(content));
      return cachedConfig;
    } catch (error) {
      console.error(`[Config] Ignoring unreadable config ${path}:`, error instanceof Error ? error.message : error);
    }
  }

  cachedConfig = getDefaultConfig();
  return cachedConfig;
}

export async function saveConfig(config: Config, configPath?: string): Promise<void> {
  const path = configPath ?? CONFIG_PATHS[0];
  await writeFile(path, JSON.stringify(config, null, 2));
  cachedConfig = config;
}

export async function configExists(): Promise<boolean> {
  for (const path of CONFIG_PATHS) {
    if (await exists(path)) return true;
  }
  return false;
}

export async function initConfig(configPath?: string): Promise<string> {
  const path = configPath ?? CONFIG_PATHS[0];
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(getDefaultConfig(), null, 2));
  return path;
}

/**
 * Add directory trees to skip in future scans. Returns the folders actually added.
 */
export async function addIgnoredFolders(folders: string[], configPath?: string): Promise<string[]> {
  const config = await loadConfig(configPath);
  const added: string[] = [];

  for (const folder of folders.map((f) => resolve(f))) {
    if (!config.ignoredFolders.includes(folder)) {
      config.ignoredFolders.push(folder);
      added.push(folder);
    }
  }

  if (added.length > 0) {
    await saveConfig(config, configPath);
  }
  return added;
}

export function toScannerOptions(config: Config): ScannerOptions {
  return {
    prefixBytes: config.prefixBytes,
    minSize: config.minSize,
    concurrency: config.concurrency,
    ignoredFolders: config.ignoredFolders,
    ignoredPaths: config.ignoredPaths,
  };
}
