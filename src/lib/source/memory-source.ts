/**
 * In-memory row source
 * Tables are arrays of rows with the header first. Used by the schema
 * control-file loader for already-read text and by tests.
 */

import Papa from "papaparse";
import type { Row, RowSource, TableBody } from "./types.js";
import { SourceError } from "../../utils/errors.js";

export class InMemoryRowSource implements RowSource {
  private readonly tables = new Map<string, readonly Row[]>();
  private readonly openTables = new Set<string>();

  constructor(tables: Record<string, readonly Row[]> = {}) {
    for (const [name, rows] of Object.entries(tables)) {
      this.tables.set(name, rows);
    }
  }

  /**
   * Build a source from CSV text per table
   *
   * @throws SourceError when a table's text is not well-formed
   */
  static fromCsv(
    tables: Record<string, string>,
    delimiter: string = ",",
  ): InMemoryRowSource {
    const source = new InMemoryRowSource();
    for (const [name, text] of Object.entries(tables)) {
      source.setTable(name, parseCsvText(name, text, delimiter));
    }
    return source;
  }

  setTable(name: string, rows: readonly Row[]): void {
    this.tables.set(name, rows);
  }

  /**
   * Tables currently held by a running `withTable` body
   */
  getOpenTables(): string[] {
    return [...this.openTables];
  }

  async withTable<T>(table: string, body: TableBody<T>): Promise<T> {
    const rows = this.tables.get(table);
    if (!rows) {
      throw new SourceError(table, `Table not found: '${table}'`);
    }
    const [header, ...data] = rows;
    if (!header) {
      throw new SourceError(table, `Table '${table}' is missing a header row`);
    }

    this.openTables.add(table);
    try {
      return await body(header, iterate(data));
    } finally {
      this.openTables.delete(table);
    }
  }
}

async function* iterate(rows: readonly Row[]): AsyncGenerator<Row> {
  for (const row of rows) {
    yield row;
  }
}

export function parseCsvText(table: string, text: string, delimiter: string): Row[] {
  const result = Papa.parse<string[]>(text, {
    delimiter,
    skipEmptyLines: true,
  });
  const [error] = result.errors;
  if (error) {
    throw new SourceError(
      table,
      `Malformed CSV in table '${table}' at record ${error.row ?? "?"}: ${error.message}`,
    );
  }
  return result.data;
}
