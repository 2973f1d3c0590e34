export * from './constants.js';
export * from './types.js';
export * from './catalog.js';
export * from './notation.js';
export * from './errors.js';
export * from './frontmatter.js';
export * from './schemas.js';
export * from './toon.js';
