import { isQueryError } from '@atlas/graph';
import type { CommandContext } from '../lib/context.js';
import { rdepsDocument, warningFields } from '../lib/documents.js';
import { parseDepTypes, parseDepth, requireComponent } from '../lib/options.js';
import { emit } from '../lib/output.js';
import { emitOptions, reportError, setup } from '../lib/setup.js';
import { openGraph } from '../lib/workspace.js';
import type { QueryFlags } from './deps.js';

/** Impact analysis: who depends on a component. Use `--depth 1` for direct dependents only. */
export async function rdepsCommand(flags: QueryFlags, ctx: CommandContext): Promise<number> {
  const env = setup(flags, ctx);
  const component = requireComponent(flags.component);
  const types = parseDepTypes(flags.depTypes);
  const maxDepth = parseDepth(flags.depth, env.config.maxDepth);

  const { graph, warnings } = await openGraph(flags, env.config, ctx.cwd);
  const result = graph.rdeps(component, { types, maxDepth });
  if (isQueryError(result)) return reportError(result.error, env.format, ctx);

  const summary = {
    component,
    dependent_count: result.dependents.length,
    ...(result.implementations ? { implementation_count: result.implementations.length } : {}),
    warning_count: warnings.length,
  };
  const document = { ...rdepsDocument(result, { types, maxDepth }), ...warningFields(warnings, ctx.cwd) };
  await emit(document, summary, emitOptions('rdeps', flags, env), ctx);
  return 0;
}
