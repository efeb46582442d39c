/**
 * Helpers for multi-row parameterized statements
 */

// Postgres caps a statement at 65535 bind parameters
export const DEFAULT_CHUNK_SIZE = 500;

export function chunk<T>(rows: readonly T[], size: number = DEFAULT_CHUNK_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    chunks.push(rows.slice(i, i + size));
  }
  return chunks;
}

/**
 * Builds `($1, $2), ($3, $4)` placeholders and the flattened values
 */
export function valuesClause(
  rows: readonly (readonly unknown[])[],
  width: number
): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const tuples = rows.map((row, rowIndex) => {
    if (row.length !== width) {
      throw new Error(`Row ${rowIndex} has ${row.length} values, expected ${width}`);
    }
    values.push(...row);
    const placeholders = row.map((_, column) => `$${rowIndex * width + column + 1}`);
    return `(${placeholders.join(', ')})`;
  });
  return { text: tuples.join(', '), values };
}
