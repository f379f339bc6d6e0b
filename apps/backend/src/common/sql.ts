/**
 * SQL helpers for repository UPDATE statements
 */

export interface SetClause {
  clauses: string[];
  values: unknown[];
}

/**
 * Build "column = $n" pairs for every defined field of a patch.
 * Placeholders start at startIndex so callers can reserve $1 for the id.
 */
export function buildSetClause<T extends object>(
  patch: T,
  columns: ReadonlyArray<readonly [keyof T, string]>,
  startIndex = 2
): SetClause {
  const clauses: string[] = [];
  const values: unknown[] = [];
  let paramIndex = startIndex;

  for (const [field, column] of columns) {
    const value = patch[field];
    if (value !== undefined) {
      clauses.push(`${column} = $${paramIndex}`);
      values.push(value);
      paramIndex++;
    }
  }

  return { clauses, values };
}

export function toNumber(value: string | number): number {
  return typeof value === 'number' ? value : parseFloat(value);
}

export function toNullableNumber(value: string | number | null): number | null {
  return value === null ? null : toNumber(value);
}

export function toDate(value: string | Date): Date {
  return value instanceof Date ? value : new Date(value);
}

export function toNullableDate(value: string | Date | null): Date | null {
  return value === null ? null : toDate(value);
}
