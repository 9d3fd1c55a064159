/**
 * Adds two numbers.
 * @param a - left operand
 * @param b - right operand
 */
export function add(a: number, b: number): number {
  return a + b;
}
