import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { serializeToon } from '@atlas/core';
import type { OutputFormat, ToonObject } from '@atlas/core';
import type { CommandContext } from './context.js';
import { defaultOutputFile } from './paths.js';

export interface EmitOptions {
  operation: string;
  format: OutputFormat;
  directResult?: boolean;
  /** Explicit destination file */
  output?: string;
  outputDir: string;
}

export function render(document: ToonObject, format: OutputFormat): string {
  return format === 'json' ? JSON.stringify(document, null, 2) + '\n' : serializeToon(document) + '\n';
}

/**
 * Write-then-rename, so a concurrent reader sees either the previous file or
 * the complete new one.
 */
export async function writeAtomic(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, filePath);
  } catch (err) {
    // The temp file may never have been created
    await unlink(tmpPath).catch(() => undefined);
    throw err;
  }
}

/**
 * Print the document, or write it to a file and print a short summary.
 * Returns the file written, if any.
 */
export async function emit(
  document: ToonObject,
  summary: ToonObject,
  options: EmitOptions,
  ctx: CommandContext,
): Promise<string | null> {
  if (options.directResult) {
    ctx.io.stdout(render(document, options.format));
    return null;
  }

  const file = options.output
    ? path.resolve(ctx.cwd, options.output)
    : defaultOutputFile(options.outputDir, options.operation, options.format, ctx.now?.() ?? new Date(), ctx.cwd);
  await writeAtomic(file, render(document, options.format));

  const status = document['status'] ?? 'success';
  const outputFile = path.relative(ctx.cwd, file) || file;
  ctx.io.stdout(render({ status, output_mode: 'file', output_file: outputFile, ...summary }, options.format));
  return file;
}
