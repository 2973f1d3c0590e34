export * from './bundle-discovery.js';
export * from './component-discovery.js';
export * from './filters.js';
export * from './indexer.js';
export * from './catalog-document.js';
export { displayPath } from './fs-utils.js';
