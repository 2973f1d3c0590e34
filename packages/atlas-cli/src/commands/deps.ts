import { isQueryError } from '@atlas/graph';
import type { CommandContext } from '../lib/context.js';
import { depsDocument, warningFields } from '../lib/documents.js';
import { parseDepTypes, parseDepth, requireComponent } from '../lib/options.js';
import { emit } from '../lib/output.js';
import { emitOptions, reportError, setup } from '../lib/setup.js';
import type { OutputFlags } from '../lib/setup.js';
import { openGraph } from '../lib/workspace.js';
import type { SourceFlags } from '../lib/workspace.js';

export interface QueryFlags extends OutputFlags, SourceFlags {
  component?: string;
  depTypes?: string;
  depth?: string;
}

export async function depsCommand(flags: QueryFlags, ctx: CommandContext): Promise<number> {
  const env = setup(flags, ctx);
  const component = requireComponent(flags.component);
  const types = parseDepTypes(flags.depTypes);
  const maxDepth = parseDepth(flags.depth, env.config.maxDepth);

  const { graph, warnings } = await openGraph(flags, env.config, ctx.cwd);
  const result = graph.deps(component, { types, maxDepth });
  if (isQueryError(result)) return reportError(result.error, env.format, ctx);

  const document = { ...depsDocument(result, { types, maxDepth }), ...warningFields(warnings, ctx.cwd) };
  await emit(
    document,
    {
      component,
      primary_count: document['primary_count'] ?? 0,
      total_count: result.dependencies.length,
      unresolved_count: result.unresolved.length,
      warning_count: warnings.length,
    },
    emitOptions('deps', flags, env),
    ctx,
  );
  return 0;
}
