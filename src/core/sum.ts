import { add, parseOperand } from '../arith/index.js';
import { EXIT_CODES } from '../config/index.js';
import {
  operandTextsSchema,
  parseInvocation,
  parseSumReport,
} from '../schema/index.js';
import type { SumOutcome, SumReport } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Output lines ────────────────────────────────────────────

export function formatUsage(program: string): string {
  return `Usage: ${program} <num1> <num2>`;
}

export function formatSum(report: SumReport): string {
  const [num1, num2] = report.operands;
  return `The sum of ${String(num1)} and ${String(num2)} is ${String(report.sum)}`;
}

// ── Program ─────────────────────────────────────────────────

/**
 * Run the add program over a full invocation (program name first).
 *
 * Exactly two operands are required; any other count yields the usage
 * outcome. Operand text that is not a number counts as 0.
 */
export function runSum(args: readonly string[]): SumOutcome {
  const [program, ...operands] = parseInvocation(args);

  const texts = operandTextsSchema.safeParse(operands);
  if (!texts.success) {
    log.debug(`expected 2 operands, got ${String(operands.length)}`);
    return {
      kind: 'usage',
      program,
      line: formatUsage(program),
      exitCode: EXIT_CODES.USAGE,
    };
  }

  const [text1, text2] = texts.data;
  const num1 = parseOperand(text1);
  const num2 = parseOperand(text2);
  log.debug(`operands "${text1}" → ${String(num1)}, "${text2}" → ${String(num2)}`);

  const report = parseSumReport({
    operands: [num1, num2],
    sum: add(num1, num2),
  });

  return {
    kind: 'sum',
    report,
    line: formatSum(report),
    exitCode: EXIT_CODES.SUCCESS,
  };
}
