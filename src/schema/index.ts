/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * The results document and the config file both decode through these.
 */

export * from './results.js';
export * from './config.js';
