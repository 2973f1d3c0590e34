import type { OutputFormat } from '@atlas/core';
import { loadConfig } from './config.js';
import type { AtlasConfig } from './config.js';
import type { CommandContext } from './context.js';
import { errorDocument } from './documents.js';
import { logger, setLogLevel } from './logger.js';
import { parseFormat } from './options.js';
import { render } from './output.js';
import type { EmitOptions } from './output.js';

/** Flags every subcommand accepts */
export interface OutputFlags {
  format?: string;
  directResult?: boolean;
  output?: string;
  config?: string;
}

export interface CommandSetup {
  config: AtlasConfig;
  format: OutputFormat;
}

export function setup(flags: OutputFlags, ctx: CommandContext): CommandSetup {
  const config = loadConfig(ctx.cwd, flags.config);
  setLogLevel(config.logLevel);
  return { config, format: parseFormat(flags.format, config.format) };
}

export function emitOptions(operation: string, flags: OutputFlags, { config, format }: CommandSetup): EmitOptions {
  return {
    operation,
    format,
    directResult: flags.directResult ?? false,
    ...(flags.output ? { output: flags.output } : {}),
    outputDir: config.outputDir,
  };
}

/** Error documents always go to stdout; the exit code is 1 */
export function reportError(
  error: { kind: string; message: string },
  format: OutputFormat,
  ctx: CommandContext,
): number {
  logger.error(error.message);
  ctx.io.stdout(render(errorDocument(error), format));
  return 1;
}
