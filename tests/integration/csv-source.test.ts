/**
 * CSV directory source against real files in a temporary directory
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CsvDirectorySource } from '../../src/lib/source/index.js';
import type { Row } from '../../src/lib/source/types.js';
import { DataError, SourceError } from '../../src/utils/errors.js';

async function collect(rows: AsyncIterable<Row>): Promise<Row[]> {
  const out: Row[] = [];
  for await (const row of rows) out.push(row);
  return out;
}

describe('CsvDirectorySource', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tablelint-source-'));
    await writeFile(join(dir, 'users.csv'), 'id,name\n1,Alice\n2,"Smith, Jane"\n', 'utf-8');
    await writeFile(join(dir, 'crlf.csv'), 'id,name\r\n1,Alice\r\n', 'utf-8');
    await writeFile(join(dir, 'semi.txt'), 'id;name\n1;Alice\n', 'utf-8');
    await writeFile(join(dir, 'items.csv'), 'id\n1\n', 'utf-8');
    await writeFile(join(dir, 'empty.csv'), '', 'utf-8');
    // 'é' takes bytes 65535 and 65536, across the first read chunk
    await writeFile(join(dir, 'wide.csv'), `id\n${'a'.repeat(65532)}é\n`, 'utf-8');
    await writeFile(join(dir, 'unterminated.csv'), 'id,name\n1,"Alice\n2,Bob\n', 'utf-8');
    await writeFile(
      join(dir, 'many.csv'),
      ['id', ...Array.from({ length: 3000 }, (_, i) => String(i + 1))].join('\n') + '\n',
      'utf-8',
    );
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should stream header and rows', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir });

    const result = await source.withTable('users', async (header, rows) => ({
      header,
      rows: await collect(rows),
    }));

    expect(result).toEqual({
      header: ['id', 'name'],
      rows: [['1', 'Alice'], ['2', 'Smith, Jane']],
    });
  });

  it('should handle CRLF line endings', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir });
    const rows = await source.withTable('crlf', async (header, rest) => [header, ...(await collect(rest))]);
    expect(rows).toEqual([['id', 'name'], ['1', 'Alice']]);
  });

  it('should apply the configured extension and delimiter', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir, extension: '.txt', delimiter: ';' });
    const rows = await source.withTable('semi', async (header, rest) => [header, ...(await collect(rest))]);
    expect(rows).toEqual([['id', 'name'], ['1', 'Alice']]);
  });

  it('should decode multibyte characters split across read chunks', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir });
    const rows = await source.withTable('wide', async (_header, rest) => collect(rest));
    expect(rows).toEqual([[`${'a'.repeat(65532)}é`]]);
  });

  it('should read every row of a table larger than the row buffer', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir });
    const rows = await source.withTable('many', async (_header, rest) => collect(rest));
    expect(rows).toHaveLength(3000);
    expect(rows[2999]).toEqual(['3000']);
  });

  it('should report malformed CSV as a source error', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir });
    const run = source.withTable('unterminated', async (_header, rows) => collect(rows));

    await expect(run).rejects.toBeInstanceOf(SourceError);
    await expect(
      source.withTable('unterminated', async (_header, rows) => collect(rows)),
    ).rejects.toThrow(/^Malformed CSV in table 'unterminated' at record \d+: Quoted field unterminated$/);
  });

  it('should use table names as file names with an empty extension', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir, extension: '' });
    const header = await source.withTable('items.csv', async (h) => h);
    expect(header).toEqual(['id']);
  });

  it('should report missing tables', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir });
    const run = source.withTable('orders', async () => 0);

    await expect(run).rejects.toBeInstanceOf(SourceError);
    await expect(source.withTable('orders', async () => 0)).rejects.toThrow(
      `Table not found: 'orders' (${join(dir, 'orders.csv')})`,
    );
  });

  it('should refuse identifiers that leave the directory', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir });
    await expect(source.withTable('../users', async () => 0)).rejects.toThrow(
      "Illegal character in table identifier: '..'",
    );
  });

  it('should report a file without a header row', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir });
    await expect(source.withTable('empty', async () => 0)).rejects.toThrow(
      "Table 'empty' is missing a header row",
    );
  });

  it('should pass errors from the body through unchanged', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir });
    const failure = new DataError('row-arity', { table: 'users', row: 2 }, 'bad row');

    await expect(
      source.withTable('users', async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
  });

  it('should allow reopening a table after stopping early', async () => {
    const source = new CsvDirectorySource({ rootDirectory: dir });

    const first = await source.withTable('users', async (_header, rows) => {
      for await (const row of rows) return row;
      return undefined;
    });
    const all = await source.withTable('users', async (_header, rows) => collect(rows));

    expect(first).toEqual(['1', 'Alice']);
    expect(all).toHaveLength(2);
  });
});
