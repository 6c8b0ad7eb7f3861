/**
 * Schema module — single source of truth for the program's data shapes.
 * Zod schemas + inferred TypeScript types.
 */

export * from './invocation.js';
