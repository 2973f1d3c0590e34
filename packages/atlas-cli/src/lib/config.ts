import fs from 'fs';
import { z } from 'zod';
import {
  DEFAULT_MAX_DEPTH,
  DEFAULT_SCRIPT_EXTENSIONS,
  InvalidArgumentError,
  OutputFormatSchema,
  describeCause,
  isScriptNotation,
} from '@atlas/core';
import { LOG_LEVEL_NAMES } from './logger.js';
import { ATLAS_DIRS, resolveConfigPath } from './paths.js';

export const AtlasConfigSchema = z
  .object({
    /** Bundle collection roots, relative to the working directory */
    roots: z.array(z.string().min(1)).min(1).default(['marketplace/bundles']),
    /** Project-local component directory, indexed as `project-skills` */
    projectScope: z.string().min(1).default('.claude'),
    /** Directory holding `<bundle>/` test trees */
    testRoot: z.string().min(1).default('test'),
    outputDir: z.string().min(1).default(ATLAS_DIRS.TEMP),
    format: OutputFormatSchema.default('toon'),
    maxDepth: z.number().int().min(1).default(DEFAULT_MAX_DEPTH),
    logLevel: z.enum(LOG_LEVEL_NAMES).default('info'),
    scriptExtensions: z
      .array(z.string().regex(/^\.[\w]+$/, 'expected an extension such as ".py"'))
      .default([...DEFAULT_SCRIPT_EXTENSIONS]),
    /** Module name → script notation */
    moduleMappings: z
      .record(z.string().refine(isScriptNotation, 'expected a bundle:skill:script notation'))
      .default({}),
  })
  .strict();

export type AtlasConfig = z.infer<typeof AtlasConfigSchema>;

export function defaultConfig(): AtlasConfig {
  return AtlasConfigSchema.parse({});
}

/**
 * Load `atlas.config.json` from the working directory, or an explicit path.
 * Missing fields are filled with defaults; a missing default file means all
 * defaults, a missing explicit file is an error.
 */
export function loadConfig(cwd: string = process.cwd(), explicitPath?: string): AtlasConfig {
  const configPath = resolveConfigPath(cwd, explicitPath);

  if (!fs.existsSync(configPath)) {
    if (explicitPath) throw new InvalidArgumentError(`Config file not found: ${configPath}`);
    return defaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new InvalidArgumentError(`Config file ${configPath} is not valid JSON: ${describeCause(err)}`, err);
  }

  const result = AtlasConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new InvalidArgumentError(`Invalid config ${configPath} at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}
