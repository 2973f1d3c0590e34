import { isQueryError } from '@atlas/graph';
import type { CommandContext } from '../lib/context.js';
import { validateDocument, warningFields } from '../lib/documents.js';
import { logger } from '../lib/logger.js';
import { parseCsv, parseDepTypes } from '../lib/options.js';
import { emit } from '../lib/output.js';
import { emitOptions, reportError, setup } from '../lib/setup.js';
import type { OutputFlags } from '../lib/setup.js';
import { openGraph } from '../lib/workspace.js';
import type { SourceFlags } from '../lib/workspace.js';

export interface ValidateFlags extends OutputFlags, SourceFlags {
  /** Comma-separated notations to restrict the check to */
  component?: string;
  bundles?: string;
  depTypes?: string;
}

/** Findings are data: a run that finds broken references or cycles still exits 0 */
export async function validateCommand(flags: ValidateFlags, ctx: CommandContext): Promise<number> {
  const env = setup(flags, ctx);
  const types = parseDepTypes(flags.depTypes);
  const bundles = parseCsv(flags.bundles);
  const components = parseCsv(flags.component);

  const { graph, warnings } = await openGraph(flags, env.config, ctx.cwd);
  const result = graph.validate({ types, bundles, components });
  if (isQueryError(result)) return reportError(result.error, env.format, ctx);

  if (result.result === 'passed') logger.success('No broken references or cycles');
  else logger.warn(`${result.broken.length} broken reference(s), ${result.cycles.length} cycle(s)`);

  const scope = [...bundles, ...components].join(',') || 'all';
  await emit(
    { ...validateDocument(result, types, scope), ...warningFields(warnings, ctx.cwd) },
    {
      validation_result: result.result,
      broken_count: result.broken.length,
      cycle_count: result.cycles.length,
      warning_count: warnings.length,
    },
    emitOptions('validate', flags, env),
    ctx,
  );
  return 0;
}
