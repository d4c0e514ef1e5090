import { connect } from "@lancedb/lancedb";

export const VECTOR_TABLE_NAME = "vectors";

export type VectorRow = {
  row: number;
  vector: number[];
};

/**
 * Writes row-aligned vectors to a LanceDB table under `dbPath`, replacing any
 * table of the same name.
 */
export async function writeVectorTable(
  dbPath: string,
  vectors: number[][],
  tableName: string = VECTOR_TABLE_NAME,
): Promise<void> {
  if (vectors.length === 0) {
    throw new Error("refusing to write an empty vector table");
  }

  const rows: VectorRow[] = vectors.map((vector, row) => ({ row, vector }));
  const db = await connect(dbPath);
  try {
    const table = await db.createTable(tableName, rows, { mode: "overwrite" });
    table.close();
  } finally {
    db.close();
  }
}

/**
 * Reads every vector back in row order. Throws when the table is missing,
 * rows are malformed, or row numbers are not exactly 0..n-1.
 */
export async function readVectorTable(
  dbPath: string,
  tableName: string = VECTOR_TABLE_NAME,
): Promise<number[][]> {
  const db = await connect(dbPath);
  try {
    const tableNames = await db.tableNames();
    if (!tableNames.includes(tableName)) {
      throw new Error(`vector table '${tableName}' not found in ${dbPath}`);
    }

    const table = await db.openTable(tableName);
    try {
      // A bare query returns LanceDB's default page of 10 rows.
      const total = await table.countRows();
      const rows = total > 0 ? await table.query().limit(total).toArray() : [];
      const ordered = rows
        .map((row: unknown, index: number) => toVectorRow(row, index))
        .sort((a, b) => a.row - b.row);

      for (const [position, entry] of ordered.entries()) {
        if (entry.row !== position) {
          throw new Error(`vector table has a gap at row ${position}`);
        }
      }

      return ordered.map((entry) => entry.vector);
    } finally {
      table.close();
    }
  } finally {
    db.close();
  }
}

function toVectorRow(value: unknown, index: number): VectorRow {
  if (typeof value !== "object" || value === null) {
    throw new Error(`vector table row ${index} is not an object`);
  }

  const row = "row" in value ? toNumber(value.row) : Number.NaN;
  const vector = "vector" in value ? toNumberArray(value.vector) : null;
  if (!Number.isInteger(row) || vector === null) {
    throw new Error(`vector table row ${index} is malformed`);
  }
  return { row, vector };
}

function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  return Number.NaN;
}

function toNumberArray(value: unknown): number[] | null {
  if (Array.isArray(value)) {
    return value.every((entry) => typeof entry === "number") ? value.map(Number) : null;
  }
  if (isIterable(value)) {
    const entries = Array.from(value);
    return entries.every((entry) => typeof entry === "number") ? entries.map(Number) : null;
  }
  return null;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.iterator in value;
}
