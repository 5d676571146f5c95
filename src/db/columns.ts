/**
 * Column value narrowing shared by the repositories
 */

/**
 * Narrow a TEXT column constrained by a CHECK to its union type
 */
export function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Unexpected value "${value}" in column ${column}`);
  }
  return match;
}

/**
 * BIGINT and COUNT(*) arrive from pg as strings
 */
export function toNumber(value: string | number): number {
  return typeof value === 'number' ? value : Number(value);
}

export function toNullableNumber(value: string | number | null): number | null {
  return value === null ? null : toNumber(value);
}
