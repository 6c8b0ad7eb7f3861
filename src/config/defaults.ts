/**
 * Fixed values of the add program.
 * Nothing here is read from a file; the environment only tunes logging.
 */

export const PROGRAM = {
  NAME: 'add',
} as const;

export const EXIT_CODES = {
  SUCCESS: 0,
  USAGE: 1,
  INTERNAL: 4,
} as const;

export const INT32 = {
  MIN: -2_147_483_648,
  MAX: 2_147_483_647,
} as const;

// strtol saturates at the 64-bit long range before the int truncation
export const INT64 = {
  MIN: -(2n ** 63n),
  MAX: 2n ** 63n - 1n,
} as const;
