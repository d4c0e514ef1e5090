import type { VectorMatch } from "./types.js";

/**
 * Exact inner-product index over row-aligned vectors. Dimensionality is fixed
 * by the first vector added. Rows are only ever appended; a changed corpus
 * means a new index.
 */
export class FlatVectorIndex {
  private readonly rows: Float32Array[] = [];
  private dims: number | null;

  constructor(dimensions?: number) {
    this.dims = dimensions ?? null;
  }

  get size(): number {
    return this.rows.length;
  }

  get dimensions(): number | null {
    return this.dims;
  }

  add(vectors: ArrayLike<number>[]): void {
    for (const vector of vectors) {
      if (this.dims === null) {
        if (vector.length === 0) {
          throw new Error("cannot index an empty vector");
        }
        this.dims = vector.length;
      }
      if (vector.length !== this.dims) {
        throw new Error(
          `vector dimension mismatch: index has ${this.dims}, got ${vector.length} (row ${this.rows.length})`,
        );
      }
      this.rows.push(Float32Array.from(vector));
    }
  }

  vectorAt(row: number): number[] | undefined {
    const vector = this.rows[row];
    return vector ? Array.from(vector) : undefined;
  }

  /** Top `k` rows by descending inner product; equal scores keep row order. */
  search(query: ArrayLike<number>, k: number): VectorMatch[] {
    if (k <= 0 || this.rows.length === 0 || this.dims === null) {
      return [];
    }
    if (query.length !== this.dims) {
      throw new Error(`query dimension mismatch: index has ${this.dims}, got ${query.length}`);
    }

    const scored: VectorMatch[] = this.rows.map((vector, row) => ({
      row,
      score: dot(vector, query),
    }));
    scored.sort((a, b) => b.score - a.score || a.row - b.row);
    return scored.slice(0, Math.floor(k));
  }
}

function dot(a: Float32Array, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}
