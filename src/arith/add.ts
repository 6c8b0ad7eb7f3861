/**
 * Sum of two int32 values with native fixed-width wrap-around.
 */
export function add(a: number, b: number): number {
  return (a + b) | 0;
}
