import { RESOURCE_GROUPS, RESOURCE_TYPES } from '@atlas/core';
import type { Catalog, OutputFormat, ReferenceType, ScanWarning, ToonObject, ToonValue } from '@atlas/core';
import { displayPath, toCatalogDocument } from '@atlas/inventory';
import { locatorOf } from '@atlas/graph';
import type {
  DepsResult,
  ReachedComponent,
  RdepsResult,
  TreeNode,
  TreeResult,
  ValidateResult,
} from '@atlas/graph';

// Result documents: snake_case keys, counts next to every list so callers can
// branch without walking the rows.

export interface QueryEcho {
  types: readonly ReferenceType[];
  maxDepth: number;
}

// ─── scan ────────────────────────────────────────────────────────────────────

export function scanDocument(catalog: Catalog, format: OutputFormat, cwd: string): ToonObject {
  const head: ToonObject = {
    status: 'success',
    statistics: scanStatistics(catalog),
  };
  if (catalog.contentFilter) {
    head['content_filter_stats'] = {
      input_count: catalog.contentFilter.inputCount,
      matched_count: catalog.contentFilter.matchedCount,
      excluded_count: catalog.contentFilter.excludedCount,
    };
  }

  if (format === 'json') {
    const doc = toCatalogDocument(catalog, { cwd, includeFiles: true });
    return { ...head, ...toDocumentObject(doc) };
  }

  const bundles: ToonObject = {};
  for (const bundle of catalog.bundles) {
    const entry: ToonObject = { path: displayPath(bundle.path, cwd) };
    if (bundle.scope === 'secondary') entry['scope'] = 'secondary';
    for (const type of RESOURCE_TYPES) {
      const rows = catalog.inBundle(bundle.name).filter((c) => c.type === type);
      if (rows.length === 0) continue;
      entry[RESOURCE_GROUPS[type]] = rows.map((c) => {
        const row: ToonObject = { name: c.name, notation: c.notation, path: displayPath(c.path, cwd) };
        if (c.description) row['description'] = c.description;
        return row;
      });
    }
    bundles[bundle.name] = entry;
  }

  return {
    ...head,
    roots: catalog.roots.map((r) => displayPath(r, cwd)),
    bundles,
    ...warningFields(catalog.warnings, cwd),
  };
}

export function scanStatistics(catalog: Catalog): ToonObject {
  const stats = catalog.statistics();
  const byType: ToonObject = {};
  for (const type of RESOURCE_TYPES) byType[RESOURCE_GROUPS[type]] = stats.byType[type];
  return { total_bundles: stats.totalBundles, total_resources: stats.total, ...byType };
}

// ─── deps / rdeps ────────────────────────────────────────────────────────────

export function depsDocument(result: DepsResult, query: QueryEcho): ToonObject {
  const primary = result.dependencies.filter((d) => d.distance === 1).length;
  return {
    status: 'success',
    component: result.component,
    component_type: result.componentType,
    dep_types: typesLabel(query.types),
    max_depth: query.maxDepth,
    primary_count: primary,
    transitive_count: result.dependencies.length - primary,
    total_count: result.dependencies.length,
    dependencies: result.dependencies.map((d) => ({
      target: d.notation,
      component_type: d.componentType,
      distance: d.distance,
      ref_type: lastType(d),
      via: d.via,
      path: d.types.join('>'),
    })),
    unresolved_count: result.unresolved.length,
    unresolved: result.unresolved.map((r) => ({
      type: r.type,
      mention: r.mention,
      status: r.status,
      locator: locatorOf(r),
    })),
  };
}

export function rdepsDocument(result: RdepsResult, query: QueryEcho): ToonObject {
  const doc: ToonObject = {
    status: 'success',
    component: result.component,
    dep_types: typesLabel(query.types),
    max_depth: query.maxDepth,
  };
  if (result.componentType) doc['component_type'] = result.componentType;
  doc['dependent_count'] = result.dependents.length;
  doc['dependents'] = result.dependents.map((d) => ({
    source: d.notation,
    component_type: d.componentType,
    distance: d.distance,
    ref_type: lastType(d),
    via: d.via,
    path: d.types.join('>'),
  }));
  if (result.implementations) {
    doc['implementation_count'] = result.implementations.length;
    doc['implementations'] = result.implementations.map((r) => ({
      source: r.source,
      mention: r.mention,
      status: r.status,
      locator: locatorOf(r),
    }));
  }
  return doc;
}

// ─── tree ────────────────────────────────────────────────────────────────────

export interface TreeEdgeRow extends ToonObject {
  from: string;
  to: string;
  type: string;
  depth: number;
  marker: string;
}

export function treeDocument(result: TreeResult, query: QueryEcho, format: OutputFormat): ToonObject {
  const edges = treeEdges(result.root);
  return {
    status: 'success',
    component: result.component,
    dep_types: typesLabel(query.types),
    max_depth: result.maxDepth,
    node_count: edges.length + 1,
    tree: format === 'json' ? treeNodeValue(result.root) : renderTree(result.root),
    edges,
  };
}

/**
 * Box-drawing rendering, one line per node:
 *
 *   alpha:build
 *   ├── alpha:build:run (script)
 *   └── beta:lint (skill) [cycle]
 */
export function renderTree(root: TreeNode): string {
  const lines: string[] = [root.notation];
  const stack: Array<{ node: TreeNode; prefix: string; last: boolean }> = [];
  pushChildren(stack, root, '');

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, prefix, last } = frame;
    const edge = node.edgeType ? ` (${node.edgeType})` : '';
    const marker = node.marker ? ` [${node.marker}]` : '';
    lines.push(`${prefix}${last ? '└── ' : '├── '}${node.notation}${edge}${marker}`);
    pushChildren(stack, node, prefix + (last ? '    ' : '│   '));
  }
  return lines.join('\n');
}

function pushChildren(
  stack: Array<{ node: TreeNode; prefix: string; last: boolean }>,
  node: TreeNode,
  prefix: string,
): void {
  for (let i = node.children.length - 1; i >= 0; i--) {
    const child = node.children[i];
    if (child) stack.push({ node: child, prefix, last: i === node.children.length - 1 });
  }
}

/** Parent → child rows in depth-first order */
export function treeEdges(root: TreeNode): TreeEdgeRow[] {
  const rows: TreeEdgeRow[] = [];
  const stack: TreeNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    node.children.forEach((child) => {
      rows.push({
        from: node.notation,
        to: child.notation,
        type: child.edgeType ?? '',
        depth: child.depth,
        marker: child.marker ?? '',
      });
    });
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
  }
  return rows;
}

function treeNodeValue(node: TreeNode): ToonObject {
  const value: ToonObject = { notation: node.notation };
  if (node.componentType) value['component_type'] = node.componentType;
  if (node.edgeType) value['edge_type'] = node.edgeType;
  if (node.marker) value['marker'] = node.marker;
  value['children'] = node.children.map(treeNodeValue);
  return value;
}

// ─── validate ────────────────────────────────────────────────────────────────

export function validateDocument(result: ValidateResult, types: readonly ReferenceType[], scope: string): ToonObject {
  return {
    status: 'success',
    validation_result: result.result,
    scope,
    dep_types: typesLabel(types),
    totals: {
      components: result.totals.components,
      references: result.totals.references,
      resolved: result.totals.resolved,
      unresolved: result.totals.unresolved,
      ambiguous: result.totals.ambiguous,
      external: result.totals.external,
    },
    broken_count: result.broken.length,
    broken: result.broken.map((b) => {
      const row: ToonObject = {
        source: b.source,
        type: b.type,
        mention: b.mention,
        status: b.status,
        locator: b.locator,
      };
      if (b.candidates) row['candidates'] = b.candidates.join(' ');
      return row;
    }),
    cycle_count: result.cycles.length,
    cycles: result.cycles.map((c) => ({
      length: c.members.length,
      chain: [...c.members, c.members[0] ?? ''].join(' -> '),
      types: c.types.join('>'),
    })),
  };
}

// ─── warnings ────────────────────────────────────────────────────────────────

/** Per-item problems recovered during the run, appended to every result document */
export function warningFields(warnings: readonly ScanWarning[], cwd: string): ToonObject {
  return {
    warning_count: warnings.length,
    warnings: warnings.map((w) => ({ kind: w.kind, path: displayPath(w.path, cwd), message: w.message })),
  };
}

// ─── errors ──────────────────────────────────────────────────────────────────

export function errorDocument(error: { kind: string; message: string }): ToonObject {
  return { status: 'error', error: { kind: error.kind, message: error.message } };
}

// ─── helpers ─────────────────────────────────────────────────────────────────

function typesLabel(types: readonly ReferenceType[]): string {
  return types.length === 0 ? 'all' : types.join(',');
}

function lastType(entry: ReachedComponent): string {
  return entry.types[entry.types.length - 1] ?? '';
}

/** Plain JSON data as a document value; undefined fields are dropped */
export function toDocumentValue(value: unknown): ToonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(toDocumentValue);
  if (typeof value === 'object') return toDocumentObject(value);
  return null;
}

function toDocumentObject(value: object): ToonObject {
  const result: ToonObject = {};
  for (const [key, field] of Object.entries(value)) {
    if (field !== undefined) result[key] = toDocumentValue(field);
  }
  return result;
}
