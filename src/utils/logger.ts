/**
 * Execution logger for add.
 *
 * All output goes to stderr so stdout carries only the program's result line.
 * Silent unless a level is configured.
 */

import type { LogLevel } from '../config/env.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = 'silent';

// ── Core write ──────────────────────────────────────────────

function write(level: Exclude<LogLevel, 'silent'>, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function setLevel(level: LogLevel): void {
  currentLevel = level;
}

export function debug(message: string): void {
  write('debug', `🔍 ${message}`);
}
