import path from 'path';
import type { Catalog, ScanWarning } from '@atlas/core';
import { InventoryIndexer, loadCatalog } from '@atlas/inventory';
import type { ScanOptions } from '@atlas/inventory';
import { DependencyGraph, collectReferences } from '@atlas/graph';
import type { AtlasConfig } from './config.js';
import { logger, spinner } from './logger.js';

/** Where the catalog for a query comes from */
export interface SourceFlags {
  /** Previously written JSON catalog document */
  catalog?: string;
  /** Overrides the configured roots */
  root?: string[];
  includeProjectScope?: boolean;
  includeTests?: boolean;
  directResult?: boolean;
}

export function scanOptionsFrom(flags: SourceFlags, config: AtlasConfig, cwd: string): ScanOptions {
  return {
    roots: flags.root && flags.root.length > 0 ? flags.root : config.roots,
    includeTests: flags.includeTests ?? false,
    includeSecondaryScope: flags.includeProjectScope ?? false,
    secondaryScope: path.resolve(cwd, config.projectScope),
    testRoot: path.resolve(cwd, config.testRoot),
    scriptExtensions: config.scriptExtensions,
  };
}

export async function openCatalog(flags: SourceFlags, config: AtlasConfig, cwd: string): Promise<Catalog> {
  if (flags.catalog) {
    const catalog = await loadCatalog(flags.catalog, cwd);
    logger.info(`Loaded ${catalog.size} components from ${flags.catalog}`);
    return catalog;
  }

  const spin = spinner('Scanning bundles...', !flags.directResult && process.stderr.isTTY === true);
  try {
    const catalog = await new InventoryIndexer(cwd).scan(scanOptionsFrom(flags, config, cwd));
    spin.succeed(`Indexed ${catalog.size} components in ${catalog.bundles.length} bundles`);
    return catalog;
  } catch (err) {
    spin.fail('Scan failed');
    throw err;
  }
}

export interface OpenedGraph {
  graph: DependencyGraph;
  /** Scan and extraction warnings, each listed once */
  warnings: ScanWarning[];
}

export async function openGraph(flags: SourceFlags, config: AtlasConfig, cwd: string): Promise<OpenedGraph> {
  const catalog = await openCatalog(flags, config, cwd);
  const { references, warnings } = await collectReferences(catalog, { moduleMappings: config.moduleMappings });
  const merged = mergeWarnings(catalog.warnings, warnings);
  if (merged.length > 0) logger.verbose(`${merged.length} warning(s) recorded in the result`);
  logger.verbose(`Extracted ${references.length} references`);
  return { graph: new DependencyGraph(catalog, references), warnings: merged };
}

// A header read at scan time is read again during extraction
function mergeWarnings(...lists: ReadonlyArray<readonly ScanWarning[]>): ScanWarning[] {
  const seen = new Set<string>();
  const merged: ScanWarning[] = [];
  for (const warning of lists.flat()) {
    const key = [warning.kind, warning.path, warning.message].join('\u0000');
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(warning);
  }
  return merged;
}
