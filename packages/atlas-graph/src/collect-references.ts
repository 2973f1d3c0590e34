import { readFile } from 'fs/promises';
import { describeCause } from '@atlas/core';
import type { Catalog, Component, Reference, ScanWarning } from '@atlas/core';
import { extract } from './reference-extractor.js';
import { DependencyGraph } from './dependency-graph.js';

export type TextLoader = (component: Component) => Promise<string>;

export interface CollectOptions {
  loader?: TextLoader;
  moduleMappings?: Readonly<Record<string, string>>;
}

export interface ReferenceSet {
  references: Reference[];
  /** Unreadable components, which contribute no references, and malformed headers */
  warnings: ScanWarning[];
}

const readText: TextLoader = async (component) => component.content ?? readFile(component.path, 'utf-8');

/**
 * Run extraction over every catalog component. Texts are loaded
 * concurrently; references are concatenated in catalog order.
 */
export async function collectReferences(catalog: Catalog, options: CollectOptions = {}): Promise<ReferenceSet> {
  const loader = options.loader ?? readText;
  const warnings: ScanWarning[] = [];

  const perComponent = await Promise.all(
    catalog.components.map(async (component) => {
      let text: string;
      try {
        text = await loader(component);
      } catch (err) {
        warnings.push({ kind: 'IOError', path: component.path, message: describeCause(err) });
        return [];
      }
      return extract(component, catalog, {
        text,
        moduleMappings: options.moduleMappings,
        onWarning: (warning) => warnings.push(warning),
      });
    }),
  );

  warnings.sort((a, b) => a.path.localeCompare(b.path) || a.kind.localeCompare(b.kind));
  return { references: perComponent.flat(), warnings };
}

export async function buildGraph(catalog: Catalog, options: CollectOptions = {}): Promise<DependencyGraph> {
  const { references } = await collectReferences(catalog, options);
  return new DependencyGraph(catalog, references);
}
