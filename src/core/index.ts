/**
 * Core module — the straight-line add program.
 * Pure apart from debug logging; the CLI owns stdout and the exit code.
 */

export { runSum, formatUsage, formatSum } from './sum.js';
