import { isQueryError } from '@atlas/graph';
import type { CommandContext } from '../lib/context.js';
import { treeDocument, warningFields } from '../lib/documents.js';
import { parseDepTypes, parseDepth, requireComponent } from '../lib/options.js';
import { emit } from '../lib/output.js';
import { emitOptions, reportError, setup } from '../lib/setup.js';
import { openGraph } from '../lib/workspace.js';
import type { QueryFlags } from './deps.js';

export async function treeCommand(flags: QueryFlags, ctx: CommandContext): Promise<number> {
  const env = setup(flags, ctx);
  const component = requireComponent(flags.component);
  const types = parseDepTypes(flags.depTypes);
  const maxDepth = parseDepth(flags.depth, env.config.maxDepth);

  const { graph, warnings } = await openGraph(flags, env.config, ctx.cwd);
  const result = graph.tree(component, { types, maxDepth });
  if (isQueryError(result)) return reportError(result.error, env.format, ctx);

  const document = {
    ...treeDocument(result, { types, maxDepth }, env.format),
    ...warningFields(warnings, ctx.cwd),
  };
  await emit(
    document,
    { component, node_count: document['node_count'] ?? 1, warning_count: warnings.length },
    emitOptions('tree', flags, env),
    ctx,
  );
  return 0;
}
