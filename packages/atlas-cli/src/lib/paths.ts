import path from 'path';
import type { OutputFormat } from '@atlas/core';

export const CONFIG_FILE = 'atlas.config.json';

export const ATLAS_DIRS = {
  TEMP: '.atlas/temp',
} as const;

/** `<dir>/<operation>-<timestamp>.<ext>`; the timestamp is filename-safe */
export function defaultOutputFile(
  outputDir: string,
  operation: string,
  format: OutputFormat,
  now: Date = new Date(),
  cwd: string = process.cwd(),
): string {
  const stamp = now.toISOString().replace(/[:.]/g, '-');
  return path.resolve(cwd, outputDir, `${operation}-${stamp}.${format}`);
}

export function resolveConfigPath(cwd: string, explicit?: string): string {
  return path.resolve(cwd, explicit ?? CONFIG_FILE);
}
