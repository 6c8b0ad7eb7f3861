import { z } from 'zod';

import { INT32 } from '../config/defaults.js';

// ── Invocation ──────────────────────────────────────────────

/** Process arguments, program name first. */
export const invocationSchema = z.tuple([z.string()]).rest(z.string());

export type Invocation = z.infer<typeof invocationSchema>;

/** The two operand texts of a well-formed invocation. */
export const operandTextsSchema = z.tuple([z.string(), z.string()]);

export type OperandTexts = z.infer<typeof operandTextsSchema>;

// ── Operands / report ───────────────────────────────────────

export const int32Schema = z.number().int().min(INT32.MIN).max(INT32.MAX);

export const operandsSchema = z.tuple([int32Schema, int32Schema]);

export type Operands = z.infer<typeof operandsSchema>;

export const sumReportSchema = z.object({
  operands: operandsSchema,
  sum: int32Schema,
});

export type SumReport = z.infer<typeof sumReportSchema>;

// ── Outcome ─────────────────────────────────────────────────

export type SumOutcome =
  | { kind: 'sum'; report: SumReport; line: string; exitCode: 0 }
  | { kind: 'usage'; program: string; line: string; exitCode: 1 };

// ── Validators ──────────────────────────────────────────────

export function parseInvocation(data: unknown): Invocation {
  return invocationSchema.parse(data);
}

export function parseSumReport(data: unknown): SumReport {
  return sumReportSchema.parse(data);
}
