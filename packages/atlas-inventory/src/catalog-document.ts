import { readFile } from 'fs/promises';
import path from 'path';
import {
  CATALOG_DOCUMENT_VERSION,
  Catalog,
  NotFoundError,
  InvalidArgumentError,
  RESOURCE_GROUPS,
  RESOURCE_TYPES,
  describeCause,
  formatNotation,
  parseCatalogDocument,
} from '@atlas/core';
import type {
  BundleEntry,
  BundleInfo,
  CatalogDocument,
  Component,
  ComponentEntry,
  ResourceType,
} from '@atlas/core';
import { displayPath } from './fs-utils.js';

export interface CatalogDocumentOptions {
  /** Paths in the document are written relative to this directory */
  cwd: string;
  /** List every bundle file, needed to resolve path references after reload */
  includeFiles?: boolean;
}

// ─── Serialize ───────────────────────────────────────────────────────────────

export function toCatalogDocument(catalog: Catalog, options: CatalogDocumentOptions): CatalogDocument {
  const bundles: Record<string, BundleEntry> = {};

  for (const bundle of catalog.bundles) {
    const entry: BundleEntry = {
      path: displayPath(bundle.path, options.cwd),
      scope: bundle.scope,
      skills: [],
      commands: [],
      agents: [],
      scripts: [],
      tests: [],
      files: [],
    };
    for (const component of catalog.inBundle(bundle.name)) {
      entry[RESOURCE_GROUPS[component.type]].push(toEntry(component, options.cwd));
    }
    if (options.includeFiles) {
      entry.files = [...catalog.files]
        .filter((f) => catalog.bundleContaining(f)?.name === bundle.name)
        .map((f) => path.relative(bundle.path, f).split(path.sep).join('/'))
        .sort();
    }
    bundles[bundle.name] = entry;
  }

  return {
    status: 'success',
    version: CATALOG_DOCUMENT_VERSION,
    roots: catalog.roots.map((r) => displayPath(r, options.cwd)),
    bundles,
    warnings: catalog.warnings.map((w) => ({ ...w, path: displayPath(w.path, options.cwd) })),
  };
}

function toEntry(component: Component, cwd: string): ComponentEntry {
  const entry: ComponentEntry = {
    name: component.name,
    notation: component.notation,
    path: displayPath(component.path, cwd),
  };
  if (component.skill) entry.skill = component.skill;
  if (component.description) entry.description = component.description;
  return entry;
}

// ─── Load ────────────────────────────────────────────────────────────────────

/** Rebuild a Catalog from a document produced by `toCatalogDocument` */
export function catalogFromDocument(doc: CatalogDocument, cwd: string): Catalog {
  const bundles: BundleInfo[] = [];
  const components: Component[] = [];
  const files: string[] = [];

  for (const [name, entry] of Object.entries(doc.bundles)) {
    const base = path.resolve(cwd, entry.path);
    bundles.push({ name, path: base, scope: entry.scope });
    for (const type of RESOURCE_TYPES) {
      for (const item of entry[RESOURCE_GROUPS[type]]) {
        components.push(fromEntry(name, type, item, cwd));
      }
    }
    for (const rel of entry.files) files.push(path.resolve(base, rel));
  }

  return new Catalog({
    roots: doc.roots.map((r) => path.resolve(cwd, r)),
    bundles,
    components,
    files,
    warnings: doc.warnings.map((w) => ({ ...w, path: path.resolve(cwd, w.path) })),
  });
}

function fromEntry(bundle: string, type: ResourceType, item: ComponentEntry, cwd: string): Component {
  const file = path.resolve(cwd, item.path);
  const id = { bundle, type, name: item.name, ...(item.skill ? { skill: item.skill } : {}) };
  const notation = formatNotation(id);
  if (notation !== item.notation) {
    throw new InvalidArgumentError(`Catalog entry ${item.notation} does not match its bundle/type/name (${notation})`);
  }
  const component: Component = {
    ...id,
    notation,
    path: file,
    root: type === 'skill' ? path.dirname(file) : file,
  };
  if (item.description) component.description = item.description;
  return component;
}

export async function loadCatalog(file: string, cwd: string = process.cwd()): Promise<Catalog> {
  const abs = path.resolve(cwd, file);
  let raw: string;
  try {
    raw = await readFile(abs, 'utf-8');
  } catch (err) {
    throw new NotFoundError(`Catalog not readable: ${abs} (${describeCause(err)})`, err);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new InvalidArgumentError(`Catalog is not valid JSON: ${abs}`, err);
  }
  return catalogFromDocument(parseCatalogDocument(data), cwd);
}
