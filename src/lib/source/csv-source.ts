/**
 * CSV directory row source
 * One delimited file per table, streamed through papaparse. The file is
 * paused while a batch of parsed rows waits to be read.
 */

import { createReadStream } from "fs";
import { once } from "events";
import { join } from "path";
import Papa from "papaparse";
import type { CsvSourceOptions, Row, RowSource, TableBody } from "./types.js";
import { SourceError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export const DEFAULT_EXTENSION = ".csv";
export const DEFAULT_DELIMITER = ",";

// Parsed rows held before the file is paused
const HIGH_WATER_MARK = 1024;

export class CsvDirectorySource implements RowSource {
  private readonly rootDirectory: string;
  private readonly extension: string;
  private readonly delimiter: string;

  constructor(options: CsvSourceOptions) {
    this.rootDirectory = options.rootDirectory;
    this.extension = options.extension ?? DEFAULT_EXTENSION;
    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  }

  /**
   * File backing `table`
   *
   * @throws SourceError for identifiers that would escape the root directory
   */
  resolvePath(table: string): string {
    if (table.includes("..")) {
      throw new SourceError(table, "Illegal character in table identifier: '..'");
    }
    return join(this.rootDirectory, table + this.extension);
  }

  async withTable<T>(table: string, body: TableBody<T>): Promise<T> {
    const path = this.resolvePath(table);
    // Decoded by the stream so multibyte characters never split across chunks
    const file = createReadStream(path, { encoding: "utf8" });

    try {
      await once(file, "open");
    } catch (error) {
      file.destroy();
      throw new SourceError(
        table,
        isNotFound(error)
          ? `Table not found: '${table}' (${path})`
          : `Failed to open table '${table}' (${path})`,
        { cause: error },
      );
    }

    const queue = new RowQueue(() => file.resume());
    let record = 0;

    Papa.parse<string[]>(file, {
      delimiter: this.delimiter,
      skipEmptyLines: true,
      step: (results, parser) => {
        record++;
        const [error] = results.errors;
        if (error) {
          queue.fail(
            new SourceError(
              table,
              `Malformed CSV in table '${table}' at record ${record}: ${error.message}`,
            ),
          );
          parser.abort();
          return;
        }
        queue.push(results.data);
        if (queue.length >= HIGH_WATER_MARK) {
          file.pause();
        }
      },
      complete: () => queue.finish(),
      error: (error) =>
        queue.fail(
          new SourceError(table, `Failed to read table '${table}'`, { cause: error }),
        ),
    });
    logger.debug("Opened table", { table, path });

    try {
      const header = await queue.next();
      if (header === undefined) {
        throw new SourceError(table, `Table '${table}' is missing a header row`);
      }
      return await body(header, readRows(queue));
    } finally {
      file.destroy();
      logger.debug("Closed table", { table });
    }
  }
}

/**
 * Hands rows from papaparse callbacks to an async reader, in order.
 * A failure is raised only after the rows parsed before it were read.
 */
class RowQueue {
  private readonly rows: Row[] = [];
  private failure: SourceError | undefined;
  private done = false;
  private wake: (() => void) | undefined;
  private readonly onDrain: () => void;

  constructor(onDrain: () => void) {
    this.onDrain = onDrain;
  }

  get length(): number {
    return this.rows.length;
  }

  push(row: Row): void {
    if (this.closed()) {
      return;
    }
    this.rows.push(row);
    this.notify();
  }

  fail(error: SourceError): void {
    if (this.closed()) {
      return;
    }
    this.failure = error;
    this.notify();
  }

  finish(): void {
    this.done = true;
    this.notify();
  }

  /**
   * Next row, or undefined once the file is exhausted
   *
   * @throws SourceError for a parse or read failure
   */
  async next(): Promise<Row | undefined> {
    for (;;) {
      const row = this.rows.shift();
      if (row !== undefined) {
        if (this.rows.length === 0) {
          this.onDrain();
        }
        return row;
      }
      if (this.failure) {
        throw this.failure;
      }
      if (this.done) {
        return undefined;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private closed(): boolean {
    return this.done || this.failure !== undefined;
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function* readRows(queue: RowQueue): AsyncGenerator<Row> {
  for (;;) {
    const row = await queue.next();
    if (row === undefined) {
      return;
    }
    yield row;
  }
}
