import { INT64 } from '../config/defaults.js';

// Same set as C isspace() in the default locale
const LEADING_SPACE = /^[ \t\n\v\f\r]*/;
const SIGNED_DIGITS = /^([+-]?)(\d+)/;

/**
 * Best-effort decimal parse in the manner of `atoi`.
 *
 * Leading whitespace and an optional sign are accepted, then the longest run
 * of digits; trailing text is ignored. Text without digits yields 0. The
 * value saturates at the 64-bit range and is then truncated to 32 bits.
 */
export function parseOperand(text: string): number {
  const trimmed = text.replace(LEADING_SPACE, '');
  const match = SIGNED_DIGITS.exec(trimmed);
  if (match === null) return 0;

  const [, sign, digits] = match;
  if (digits === undefined) return 0;

  let value = BigInt(digits);
  if (sign === '-') value = -value;

  if (value > INT64.MAX) value = INT64.MAX;
  if (value < INT64.MIN) value = INT64.MIN;

  return Number(BigInt.asIntN(32, value));
}
