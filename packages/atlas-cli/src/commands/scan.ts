import { InventoryIndexer } from '@atlas/inventory';
import type { CommandContext } from '../lib/context.js';
import { scanDocument } from '../lib/documents.js';
import { logger, spinner } from '../lib/logger.js';
import { parseCsv, parseResourceTypes } from '../lib/options.js';
import { emit } from '../lib/output.js';
import { emitOptions, setup } from '../lib/setup.js';
import type { OutputFlags } from '../lib/setup.js';
import { scanOptionsFrom } from '../lib/workspace.js';

export interface ScanFlags extends OutputFlags {
  root?: string[];
  resourceTypes?: string;
  bundles?: string;
  namePattern?: string;
  contentPattern?: string;
  includeTests?: boolean;
  includeDescriptions?: boolean;
  includeProjectScope?: boolean;
}

export async function scanCommand(flags: ScanFlags, ctx: CommandContext): Promise<number> {
  const env = setup(flags, ctx);
  const resourceTypes = parseResourceTypes(flags.resourceTypes);

  const options = {
    ...scanOptionsFrom(flags, env.config, ctx.cwd),
    resourceTypes,
    bundles: parseCsv(flags.bundles),
    // Asking for tests by type is enough to include them
    includeTests: (flags.includeTests ?? false) || resourceTypes.includes('test'),
    includeDescriptions: flags.includeDescriptions ?? false,
    ...(flags.namePattern ? { namePattern: flags.namePattern } : {}),
    ...(flags.contentPattern ? { contentPattern: flags.contentPattern } : {}),
  };

  const spin = spinner('Scanning bundles...', !flags.directResult && process.stderr.isTTY === true);
  const catalog = await new InventoryIndexer(ctx.cwd).scan(options).catch((err: unknown) => {
    spin.fail('Scan failed');
    throw err;
  });
  spin.succeed(`Indexed ${catalog.size} components in ${catalog.bundles.length} bundles`);
  if (catalog.warnings.length > 0) logger.verbose(`${catalog.warnings.length} scan warning(s)`);

  const stats = catalog.statistics();
  await emit(
    scanDocument(catalog, env.format, ctx.cwd),
    {
      total_bundles: stats.totalBundles,
      total_resources: stats.total,
      warning_count: stats.warningCount,
    },
    emitOptions('inventory', flags, env),
    ctx,
  );
  return 0;
}
