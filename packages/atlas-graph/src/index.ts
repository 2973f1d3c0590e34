export * from './reference-extractor.js';
export * from './dependency-graph.js';
export * from './cycles.js';
export * from './collect-references.js';
