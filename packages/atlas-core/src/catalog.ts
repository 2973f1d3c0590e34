import path from 'path';
import type { ResourceType } from './constants.js';
import type {
  BundleInfo,
  CatalogStatistics,
  Component,
  ContentFilterStats,
  ScanWarning,
} from './types.js';

export interface CatalogInit {
  roots: string[];
  bundles: BundleInfo[];
  components: Component[];
  /** Absolute paths of every file under the indexed bundles */
  files?: Iterable<string>;
  warnings?: ScanWarning[];
  contentFilter?: ContentFilterStats;
}

export interface CatalogQuery {
  types?: readonly ResourceType[];
  bundles?: readonly string[];
  name?: (name: string) => boolean;
}

/**
 * Immutable snapshot of every component found by one indexing pass.
 * Component order is the order they were given in; notation is unique.
 */
export class Catalog {
  readonly roots: readonly string[];
  readonly bundles: readonly BundleInfo[];
  readonly components: readonly Component[];
  readonly files: ReadonlySet<string>;
  readonly warnings: readonly ScanWarning[];
  readonly contentFilter?: ContentFilterStats;

  private readonly byNotation = new Map<string, Component>();
  private readonly byName = new Map<string, Component[]>();

  constructor(init: CatalogInit) {
    const warnings = [...(init.warnings ?? [])];
    const components: Component[] = [];

    for (const component of init.components) {
      const existing = this.byNotation.get(component.notation);
      if (existing) {
        warnings.push({
          kind: 'DuplicateNotation',
          path: component.path,
          message: `${component.notation} already defined by ${existing.path}`,
        });
        continue;
      }
      this.byNotation.set(component.notation, component);
      const key = nameKey(component.type, component.name);
      const named = this.byName.get(key) ?? [];
      named.push(component);
      this.byName.set(key, named);
      components.push(component);
    }

    const files = new Set<string>();
    for (const file of init.files ?? []) files.add(path.resolve(file));
    for (const component of components) files.add(component.path);

    this.roots = [...init.roots];
    this.bundles = [...init.bundles];
    this.components = components;
    this.files = files;
    this.warnings = warnings;
    if (init.contentFilter) this.contentFilter = { ...init.contentFilter };
  }

  get size(): number {
    return this.components.length;
  }

  get(notation: string): Component | undefined {
    return this.byNotation.get(notation);
  }

  has(notation: string): boolean {
    return this.byNotation.has(notation);
  }

  ofType(type: ResourceType): Component[] {
    return this.components.filter((c) => c.type === type);
  }

  inBundle(bundle: string): Component[] {
    return this.components.filter((c) => c.bundle === bundle);
  }

  /** Components of one type carrying a given name, in catalog order */
  named(type: ResourceType, name: string): Component[] {
    return [...(this.byName.get(nameKey(type, name)) ?? [])];
  }

  query(q: CatalogQuery): Component[] {
    const types = q.types && q.types.length > 0 ? new Set(q.types) : null;
    const bundles = q.bundles && q.bundles.length > 0 ? new Set(q.bundles) : null;
    return this.components.filter(
      (c) =>
        (!types || types.has(c.type)) &&
        (!bundles || bundles.has(c.bundle)) &&
        (!q.name || q.name(c.name)),
    );
  }

  hasFile(filePath: string): boolean {
    return this.files.has(path.resolve(filePath));
  }

  getBundle(name: string): BundleInfo | undefined {
    return this.bundles.find((b) => b.name === name);
  }

  /** The indexed bundle whose base path contains a file, if any */
  bundleContaining(filePath: string): BundleInfo | undefined {
    const abs = path.resolve(filePath);
    let best: BundleInfo | undefined;
    for (const bundle of this.bundles) {
      if (isInside(abs, bundle.path) && (!best || bundle.path.length > best.path.length)) best = bundle;
    }
    return best;
  }

  /**
   * The component owning a file: the one whose file set (its entry file, or
   * the whole skill directory) contains the path most specifically.
   */
  ownerOf(filePath: string): Component | undefined {
    const abs = path.resolve(filePath);
    let best: Component | undefined;
    for (const component of this.components) {
      const owns = abs === component.path || abs === component.root || isInside(abs, component.root);
      if (owns && (!best || component.root.length > best.root.length)) best = component;
    }
    return best;
  }

  statistics(): CatalogStatistics {
    const byType: Record<ResourceType, number> = { skill: 0, command: 0, agent: 0, script: 0, test: 0 };
    for (const component of this.components) byType[component.type] += 1;
    return {
      totalBundles: this.bundles.length,
      total: this.components.length,
      byType,
      warningCount: this.warnings.length,
    };
  }
}

function nameKey(type: ResourceType, name: string): string {
  return `${type}\u0000${name}`;
}

export function isInside(filePath: string, dir: string): boolean {
  const rel = path.relative(dir, filePath);
  return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
}
