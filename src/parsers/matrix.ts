import { malformedOutput } from '../shared/index.js';

/** Split a whitespace-separated block of numbers into floats. */
export function parseFloatBlock(block: string): number[] {
  const trimmed = block.trim();
  if (trimmed.length === 0) return [];
  return trimmed.split(/\s+/).map(Number);
}

/** Group a flat x,y,z sequence into per-atom rows, keeping document order. */
export function toTriples(values: readonly number[]): number[][] {
  if (values.length % 3 !== 0) {
    throw malformedOutput(
      `Cannot arrange ${values.length} values into x,y,z triples`,
      { count: values.length },
    );
  }
  const rows: number[][] = [];
  for (let i = 0; i < values.length; i += 3) {
    rows.push(values.slice(i, i + 3));
  }
  return rows;
}

export function flattenMatrix(matrix: readonly (readonly number[])[]): number[] {
  return matrix.flatMap(row => [...row]);
}

/**
 * Every row must hold as many values as there are rows. A short row means
 * floats were missed while stitching column blocks together.
 */
export function assertSquare(matrix: readonly (readonly number[])[], label = 'Matrix'): void {
  matrix.forEach((row, i) => {
    if (row.length !== matrix.length) {
      throw malformedOutput(
        `${label} should be square: recovered ${row.length} of ${matrix.length} values for row ${i}`,
        { row: i, row_length: row.length, rows: matrix.length },
      );
    }
  });
}
