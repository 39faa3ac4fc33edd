/**
 * Row source capability - supplies a table's header and a forward-only row sequence
 */

export type Row = readonly string[];

/**
 * Body run while a table is held open. `rows` is single-pass and finite;
 * iteration ends on exhaustion and throws on a read failure.
 */
export type TableBody<T> = (header: Row, rows: AsyncIterable<Row>) => Promise<T>;

export interface RowSource {
  /**
   * Open `table`, run `body`, and release the table on every exit path
   *
   * @throws SourceError when the table cannot be located, opened or read
   */
  withTable<T>(table: string, body: TableBody<T>): Promise<T>;
}

export interface CsvSourceOptions {
  /** Directory holding one data file per table */
  rootDirectory: string;
  /** Appended to the table name to form the file name; "" uses the name as-is */
  extension?: string;
  /** Single-character field delimiter */
  delimiter?: string;
}
