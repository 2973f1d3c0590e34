import path from 'path';
import { DEFAULT_MAX_DEPTH, REFERENCE_TYPES } from '@atlas/core';
import type { Catalog, Reference, ReferenceType, ResourceType } from '@atlas/core';
import { findCycles } from './cycles.js';
import type { Cycle } from './cycles.js';

export interface Edge {
  source: string;
  target: string;
  type: ReferenceType;
}

export interface QueryOptions {
  /** Reference types that count as edges; default all */
  types?: readonly ReferenceType[];
  maxDepth?: number;
}

export interface ValidateOptions {
  types?: readonly ReferenceType[];
  bundles?: readonly string[];
  components?: readonly string[];
}

export interface QueryError {
  status: 'error';
  error: { kind: 'NotFound'; message: string };
}

export interface ReachedComponent {
  notation: string;
  componentType: ResourceType;
  distance: number;
  /** Reference types along the discovered path, start to this node */
  types: ReferenceType[];
  /** The node this one was reached from */
  via: string;
}

export interface DepsResult {
  status: 'success';
  component: string;
  componentType: ResourceType;
  dependencies: ReachedComponent[];
  /** Direct references of the start component that did not resolve */
  unresolved: Reference[];
}

export interface RdepsResult {
  status: 'success';
  component: string;
  componentType?: ResourceType;
  dependents: ReachedComponent[];
  /** Set when the queried name is a contract rather than a component */
  implementations?: Reference[];
}

export type TreeMarker = 'cycle' | 'deduped' | 'unresolved';

export interface TreeNode {
  notation: string;
  componentType?: ResourceType;
  /** Type of the reference from the parent; absent on the root */
  edgeType?: ReferenceType;
  depth: number;
  marker?: TreeMarker;
  children: TreeNode[];
}

export interface TreeResult {
  status: 'success';
  component: string;
  maxDepth: number;
  root: TreeNode;
}

export interface BrokenReference {
  source: string;
  type: ReferenceType;
  mention: string;
  status: 'unresolved' | 'ambiguous';
  locator: string;
  candidates?: string[];
}

export interface ValidationTotals {
  components: number;
  references: number;
  resolved: number;
  unresolved: number;
  ambiguous: number;
  external: number;
}

export interface ValidateResult {
  status: 'success';
  result: 'passed' | 'issues_found';
  totals: ValidationTotals;
  broken: BrokenReference[];
  cycles: Cycle[];
}

/**
 * Read-only dependency view over one catalog snapshot. Nodes are catalog
 * components; edges are resolved references with a component target.
 */
export class DependencyGraph {
  private readonly forward = new Map<string, Edge[]>();
  private readonly backward = new Map<string, Edge[]>();
  private readonly bySource = new Map<string, Reference[]>();

  constructor(
    readonly catalog: Catalog,
    readonly references: readonly Reference[],
  ) {
    for (const ref of references) {
      const list = this.bySource.get(ref.source) ?? [];
      list.push(ref);
      this.bySource.set(ref.source, list);

      if (ref.status !== 'resolved' || !ref.target || ref.target === ref.source) continue;
      if (!catalog.has(ref.source) || !catalog.has(ref.target)) continue;
      const edge: Edge = { source: ref.source, target: ref.target, type: ref.type };
      addEdge(this.forward, ref.source, edge, edge.target);
      addEdge(this.backward, ref.target, edge, edge.source);
    }
  }

  get edges(): Edge[] {
    return [...this.forward.values()].flat();
  }

  referencesFrom(notation: string): Reference[] {
    return [...(this.bySource.get(notation) ?? [])];
  }

  outgoing(notation: string, types?: readonly ReferenceType[]): Edge[] {
    return filterEdges(this.forward.get(notation), types);
  }

  incoming(notation: string, types?: readonly ReferenceType[]): Edge[] {
    return filterEdges(this.backward.get(notation), types);
  }

  // ─── deps / rdeps ──────────────────────────────────────────────────────────

  deps(component: string, options: QueryOptions = {}): DepsResult | QueryError {
    const start = this.catalog.get(component);
    if (!start) return notFound(component);
    const allowed = typeSet(options.types);
    return {
      status: 'success',
      component,
      componentType: start.type,
      dependencies: this.reach(component, options, (n) => this.outgoing(n, options.types), (e) => e.target),
      unresolved: this.referencesFrom(component).filter(
        (r) => allowed.has(r.type) && (r.status === 'unresolved' || r.status === 'ambiguous'),
      ),
    };
  }

  rdeps(component: string, options: QueryOptions = {}): RdepsResult | QueryError {
    const start = this.catalog.get(component);
    if (!start) {
      const implementations = this.implementationsOf(component);
      if (implementations.length === 0) return notFound(component);
      return { status: 'success', component, dependents: [], implementations };
    }
    return {
      status: 'success',
      component,
      componentType: start.type,
      dependents: this.reach(component, options, (n) => this.incoming(n, options.types), (e) => e.source),
    };
  }

  /**
   * Breadth-first search with a visited set, so each node settles once at its
   * shortest distance and cyclic graphs terminate. The start node is not
   * listed at depth 0, but appears at its cycle length when it reaches itself.
   */
  private reach(
    start: string,
    options: QueryOptions,
    next: (notation: string) => Edge[],
    far: (edge: Edge) => string,
  ): ReachedComponent[] {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    const pathTypes = new Map<string, ReferenceType[]>();
    const reached: ReachedComponent[] = [];
    let frontier = [start];

    for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth++) {
      const nextFrontier: string[] = [];
      for (const node of frontier) {
        for (const edge of next(node)) {
          const other = far(edge);
          if (pathTypes.has(other)) continue;
          const types = [...(pathTypes.get(node) ?? []), edge.type];
          pathTypes.set(other, types);
          const target = this.catalog.get(other);
          if (!target) continue;
          reached.push({ notation: other, componentType: target.type, distance: depth, types, via: node });
          nextFrontier.push(other);
        }
      }
      frontier = nextFrontier;
    }
    return reached;
  }

  /** Components declaring they implement a contract, matched by mention, target or file */
  implementationsOf(contract: string): Reference[] {
    const asFile = path.resolve(contract);
    return this.references.filter(
      (r) => r.type === 'implements' && (r.mention === contract || r.target === contract || r.file === asFile),
    );
  }

  // ─── tree ──────────────────────────────────────────────────────────────────

  /**
   * Depth-first expansion into a nested tree. A reference back to an ancestor
   * is a `cycle` leaf. A node already expanded elsewhere with at least as much
   * depth left is a `deduped` leaf; a shallower visit expands it again.
   */
  tree(component: string, options: QueryOptions = {}): TreeResult | QueryError {
    const start = this.catalog.get(component);
    if (!start) return notFound(component);
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    const allowed = typeSet(options.types);

    const root: TreeNode = { notation: component, componentType: start.type, depth: 0, children: [] };
    // Remaining depth each node was expanded with
    const expanded = new Map<string, number>();
    const stack: Array<{ node: TreeNode; ancestors: string[] }> = [{ node: root, ancestors: [] }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;
      const { node, ancestors } = frame;

      if (ancestors.includes(node.notation)) {
        node.marker = 'cycle';
        continue;
      }
      const remaining = maxDepth - node.depth;
      if (remaining <= 0) continue;
      if ((expanded.get(node.notation) ?? 0) >= remaining) {
        node.marker = 'deduped';
        continue;
      }
      expanded.set(node.notation, remaining);

      const seen = new Set<string>();
      for (const ref of this.referencesFrom(node.notation)) {
        if (!allowed.has(ref.type)) continue;
        if (ref.status === 'unresolved' || ref.status === 'ambiguous') {
          node.children.push({
            notation: ref.mention,
            edgeType: ref.type,
            depth: node.depth + 1,
            marker: 'unresolved',
            children: [],
          });
          continue;
        }
        if (ref.status !== 'resolved' || !ref.target || seen.has(ref.target)) continue;
        const target = this.catalog.get(ref.target);
        if (!target || ref.target === node.notation) continue;
        seen.add(ref.target);
        node.children.push({
          notation: ref.target,
          componentType: target.type,
          edgeType: ref.type,
          depth: node.depth + 1,
          children: [],
        });
      }

      const childAncestors = [...ancestors, node.notation];
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child && child.marker !== 'unresolved') stack.push({ node: child, ancestors: childAncestors });
      }
    }

    return { status: 'success', component, maxDepth, root };
  }

  // ─── validate ──────────────────────────────────────────────────────────────

  validate(options: ValidateOptions = {}): ValidateResult | QueryError {
    const missing = (options.components ?? []).find((c) => !this.catalog.has(c));
    if (missing) return notFound(missing);

    const scope = this.scopeOf(options);
    const allowed = typeSet(options.types);
    const inScope = this.references.filter((r) => scope.has(r.source) && allowed.has(r.type));

    const broken: BrokenReference[] = [];
    for (const ref of inScope) {
      if (ref.status !== 'unresolved' && ref.status !== 'ambiguous') continue;
      const item: BrokenReference = {
        source: ref.source,
        type: ref.type,
        mention: ref.mention,
        status: ref.status,
        locator: locatorOf(ref),
      };
      if (ref.candidates) item.candidates = [...ref.candidates];
      broken.push(item);
    }

    // Cycles may run through components outside the scope, so search its forward closure
    const closure = new Set(scope);
    const queue = [...scope];
    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      for (const edge of this.outgoing(node, options.types)) {
        if (closure.has(edge.target)) continue;
        closure.add(edge.target);
        queue.push(edge.target);
      }
    }
    const nodes = this.catalog.components.map((c) => c.notation).filter((n) => closure.has(n));
    const cycles = findCycles(nodes, (n) => this.outgoing(n, options.types)).filter((cycle) =>
      cycle.members.some((m) => scope.has(m)),
    );

    const totals: ValidationTotals = {
      components: scope.size,
      references: inScope.length,
      resolved: 0,
      unresolved: 0,
      ambiguous: 0,
      external: 0,
    };
    for (const ref of inScope) totals[ref.status] += 1;

    return {
      status: 'success',
      result: broken.length === 0 && cycles.length === 0 ? 'passed' : 'issues_found',
      totals,
      broken,
      cycles,
    };
  }

  private scopeOf(options: ValidateOptions): Set<string> {
    const bundles = options.bundles ?? [];
    const components = options.components ?? [];
    if (bundles.length === 0 && components.length === 0) {
      return new Set(this.catalog.components.map((c) => c.notation));
    }
    const scope = new Set(components);
    for (const bundle of bundles) {
      for (const c of this.catalog.inBundle(bundle)) scope.add(c.notation);
    }
    return scope;
  }
}

function addEdge(index: Map<string, Edge[]>, key: string, edge: Edge, other: string): void {
  const list = index.get(key) ?? [];
  const far = (e: Edge): string => (e.source === key ? e.target : e.source);
  if (!list.some((e) => e.type === edge.type && far(e) === other)) list.push(edge);
  index.set(key, list);
}

function filterEdges(edges: Edge[] | undefined, types?: readonly ReferenceType[]): Edge[] {
  if (!edges) return [];
  if (!types || types.length === 0) return [...edges];
  const allowed = new Set(types);
  return edges.filter((e) => allowed.has(e.type));
}

function typeSet(types?: readonly ReferenceType[]): Set<ReferenceType> {
  return new Set(types && types.length > 0 ? types : REFERENCE_TYPES);
}

function notFound(component: string): QueryError {
  return { status: 'error', error: { kind: 'NotFound', message: `Component not found: ${component}` } };
}

export function locatorOf(ref: Reference): string {
  if (ref.provenance.section) return ref.provenance.section;
  return ref.provenance.line !== undefined ? `line:${ref.provenance.line}` : '';
}

export function isQueryError<T extends { status: 'success' }>(result: T | QueryError): result is QueryError {
  return result.status === 'error';
}
