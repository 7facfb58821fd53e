const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

type SizeUnit = (typeof UNITS)[number];

const MULTIPLIERS: Record<SizeUnit, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
};

export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 ** 2) {
    return `${(bytes / 1024).toFixed(2)} KB`;
  }
  if (bytes < 1024 ** 3) {
    return `${(bytes / 1024 ** 2).toFixed(2)} MB`;
  }
  if (bytes < 1024 ** 4) {
    return `${(bytes / 1024 ** 3).toFixed(2)} GB`;
  }
  return `${(bytes / 1024 ** 4).toFixed(2)} TB`;
}

function isSizeUnit(value: string): value is SizeUnit {
  return UNITS.some((unit) => unit === value);
}

/**
 * "500", "1.5KB", "10 mb" -> bytes
 */
export function parseSize(sizeStr: string): number {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([a-zA-Z]*)\s*$/.exec(sizeStr);
  if (!match) {
    throw new Error(`Invalid size: "${sizeStr}"`);
  }

  const unit = (match[2] || 'B').toUpperCase();
  if (!isSizeUnit(unit)) {
    throw new Error(`Unknown size unit "${match[2]}" in "${sizeStr}"`);
  }

  return Math.round(parseFloat(match[1]) * MULTIPLIERS[unit]);
}
