#!/usr/bin/env node

/**
 * add CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import { runCli } from './run.js';

process.exitCode = await runCli(process.argv.slice(2));
