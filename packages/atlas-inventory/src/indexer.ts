import { readFile, stat } from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import {
  Catalog,
  DEFAULT_SCRIPT_EXTENSIONS,
  NotFoundError,
  PROJECT_BUNDLE_NAME,
  RESOURCE_TYPES,
  ScanIOError,
  describeCause,
  frontmatterString,
  parseFrontmatter,
} from '@atlas/core';
import type {
  BundleInfo,
  Component,
  ContentFilterStats,
  ResourceType,
  ScanWarning,
} from '@atlas/core';
import { findBundles } from './bundle-discovery.js';
import {
  discoverAgents,
  discoverCommands,
  discoverScripts,
  discoverSkills,
  discoverTests,
  listBundleFiles,
} from './component-discovery.js';
import type { DiscoveryContext } from './component-discovery.js';
import { compileContentPattern, compileNamePattern } from './filters.js';
import { isDirectory } from './fs-utils.js';

export interface ScanOptions {
  /** Bundle collection roots, relative to cwd or absolute */
  roots: string[];
  resourceTypes?: readonly ResourceType[];
  bundles?: readonly string[];
  /** `glob|glob` alternation matched against component names */
  namePattern?: string;
  /** Regular expression a component's text must match to be kept */
  contentPattern?: string;
  includeDescriptions?: boolean;
  includeTests?: boolean;
  includeSecondaryScope?: boolean;
  /** Project-local component directory, default `<cwd>/.claude` */
  secondaryScope?: string;
  /** Directory holding per-bundle test trees, default `<cwd>/test` */
  testRoot?: string;
  scriptExtensions?: readonly string[];
}

interface BundleScan {
  bundle: BundleInfo;
  components: Component[];
  files: string[];
}

/**
 * Builds a Catalog from one or more bundle roots. Bundles are scanned
 * concurrently; results are joined in bundle-name order so the catalog is
 * identical across runs of an unchanged tree.
 */
export class InventoryIndexer {
  constructor(private readonly cwd: string = process.cwd()) {}

  async scan(options: ScanOptions): Promise<Catalog> {
    const types = new Set<ResourceType>(
      options.resourceTypes && options.resourceTypes.length > 0 ? options.resourceTypes : RESOURCE_TYPES,
    );
    if (!options.includeTests) types.delete('test');

    // Validate filters before touching the filesystem
    const matchesName = options.namePattern ? compileNamePattern(options.namePattern) : null;
    const contentRegex = options.contentPattern ? compileContentPattern(options.contentPattern) : null;

    const roots = options.roots.map((r) => path.resolve(this.cwd, r));
    const bundles = await this.collectBundles(roots, options);

    const ctx: DiscoveryContext = {
      scriptExtensions: options.scriptExtensions ?? DEFAULT_SCRIPT_EXTENSIONS,
      testRoot: path.resolve(this.cwd, options.testRoot ?? 'test'),
    };

    const scans = await Promise.all(bundles.map((bundle) => this.scanBundle(bundle, types, ctx)));
    scans.sort((a, b) => compareBundles(a.bundle, b.bundle));

    const warnings: ScanWarning[] = [];
    let components = scans.flatMap((s) => s.components);
    if (matchesName) components = components.filter((c) => matchesName(c.name));

    let contentFilter: ContentFilterStats | undefined;
    if (contentRegex || options.includeDescriptions) {
      const kept: Component[] = [];
      let matched = 0;
      const inputCount = components.length;

      for (const component of components) {
        let text: string;
        try {
          text = await readFile(component.path, 'utf-8');
        } catch (err) {
          warnings.push({ kind: 'IOError', path: component.path, message: describeCause(err) });
          continue;
        }
        if (contentRegex && !contentRegex.test(text)) continue;
        matched += 1;
        kept.push(options.includeDescriptions ? withDescription(component, text, warnings) : component);
      }

      if (contentRegex) {
        contentFilter = { inputCount, matchedCount: matched, excludedCount: inputCount - matched };
      }
      components = kept;
    }

    return new Catalog({
      roots,
      bundles: scans.map((s) => s.bundle),
      components,
      files: scans.flatMap((s) => s.files),
      warnings,
      contentFilter,
    });
  }

  private async collectBundles(roots: string[], options: ScanOptions): Promise<BundleInfo[]> {
    const found: BundleInfo[] = [];
    for (const root of roots) {
      await assertRoot(root);
      found.push(...(await findBundles(root, 'primary')));
    }

    if (options.includeSecondaryScope) {
      const scope = path.resolve(this.cwd, options.secondaryScope ?? '.claude');
      if (await isDirectory(scope)) {
        found.push({ name: PROJECT_BUNDLE_NAME, path: scope, scope: 'secondary' });
      }
    }

    const wanted = options.bundles && options.bundles.length > 0 ? new Set(options.bundles) : null;
    // First root wins when two roots hold a bundle of the same name
    const seen = new Set<string>();
    return found.filter((b) => {
      if (wanted && !wanted.has(b.name)) return false;
      if (seen.has(b.name)) return false;
      seen.add(b.name);
      return true;
    });
  }

  private async scanBundle(
    bundle: BundleInfo,
    types: ReadonlySet<ResourceType>,
    ctx: DiscoveryContext,
  ): Promise<BundleScan> {
    const groups = await Promise.all([
      types.has('skill') ? discoverSkills(bundle) : [],
      types.has('command') ? discoverCommands(bundle) : [],
      types.has('agent') ? discoverAgents(bundle) : [],
      types.has('script') ? discoverScripts(bundle, ctx) : [],
      types.has('test') ? discoverTests(bundle, ctx) : [],
    ]);
    const files = await listBundleFiles(bundle);
    return { bundle, components: groups.flat(), files };
  }
}

async function assertRoot(root: string): Promise<void> {
  let info: Stats;
  try {
    info = await stat(root);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new NotFoundError(`Root not found: ${root}`, err);
    }
    throw new ScanIOError(root, err);
  }
  if (!info.isDirectory()) throw new NotFoundError(`Root is not a directory: ${root}`);
}

function withDescription(component: Component, text: string, warnings: ScanWarning[]): Component {
  if (component.type === 'script' || component.type === 'test') return component;
  const header = parseFrontmatter(text);
  if (header.warning) {
    warnings.push({ kind: 'ParseWarning', path: component.path, message: header.warning });
  }
  const description = frontmatterString(header.data, 'description');
  return description ? { ...component, description } : component;
}

function compareBundles(a: BundleInfo, b: BundleInfo): number {
  if (a.scope !== b.scope) return a.scope === 'primary' ? -1 : 1;
  return a.name.localeCompare(b.name);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
