/**
 * End-to-end validation: schema file + data directory, as the validate command runs them
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runValidate } from '../../src/cli/commands/validate.js';
import { runCheck } from '../../src/cli/commands/check.js';
import { DEFAULT_VALIDATE_CONFIG } from '../../src/utils/config-loader.js';
import { ConfigError, DataError, SchemaError, SourceError } from '../../src/utils/errors.js';

const SCHEMA = `tables:
  - name: users
    primary_key: id
    columns:
      - { name: id, type: int, not_null: true }
      - { name: name, type: string }
  - name: orders
    primary_key: id
    foreign_keys:
      - { local_column: user_id, foreign_table: users, foreign_column: id }
    columns:
      - { name: id, type: int, not_null: true }
      - { name: user_id, type: int, not_null: true }
      - { name: placed, type: "date(yyyy-MM-dd)" }
`;

describe('Validation workflow', () => {
  let dir: string;

  async function write(name: string, content: string): Promise<void> {
    await writeFile(join(dir, name), content, 'utf-8');
  }

  function validate() {
    return runValidate({
      ...DEFAULT_VALIDATE_CONFIG,
      schema: join(dir, 'schema.yaml'),
      dataDir: dir,
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tablelint-workflow-'));
    await write('schema.yaml', SCHEMA);
    await write('orders.csv', 'id,user_id,placed\n100,1,2024-01-31\n101,2,2024-02-29\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should pass valid data (scenario A)', async () => {
    await write('users.csv', 'id,name\n1,Alice\n2,Bob\n');

    await expect(validate()).resolves.toEqual([
      { table: 'users', rows: 2 },
      { table: 'orders', rows: 2 },
    ]);
  });

  it('should fail on a duplicate primary key at its second row (scenario B)', async () => {
    await write('users.csv', 'id,name\n1,Alice\n1,Bob\n');

    await expect(validate()).rejects.toThrow(
      new DataError('duplicate-key', { table: 'users', row: 3 }, "'users' line 3: Duplicate primary key ('1')"),
    );
  });

  it('should not look up foreign key values (scenario C)', async () => {
    await write('users.csv', 'id,name\n1,Alice\n2,Bob\n');
    await write('orders.csv', 'id,user_id,placed\n100,5,2024-01-31\n');

    await expect(validate()).resolves.toHaveLength(2);
  });

  it('should report the column, row and value of a bad cell (scenario D)', async () => {
    await write('users.csv', 'id,name\n1,Alice\nabc,Bob\n');

    await expect(validate()).rejects.toThrow("'users'.'id' line 3: Illegal value for type 'int': 'abc'");
  });

  it('should validate date columns with their format', async () => {
    await write('users.csv', 'id,name\n1,Alice\n');
    await write('orders.csv', 'id,user_id,placed\n100,1,31/01/2024\n');

    await expect(validate()).rejects.toThrow(
      "'orders'.'placed' line 2: Illegal value for type 'date(yyyy-MM-dd)': '31/01/2024'",
    );
  });

  it('should reject a permuted header even when the columns match', async () => {
    await write('users.csv', 'name,id\nAlice,1\n');

    await expect(validate()).rejects.toBeInstanceOf(DataError);
  });

  it('should report a missing data file as a source error', async () => {
    await write('users.csv', 'id,name\n1,Alice\n');
    await rm(join(dir, 'orders.csv'));

    await expect(validate()).rejects.toBeInstanceOf(SourceError);
  });

  it('should run the control-file front-end against its own directory', async () => {
    await write(
      'schema.csv',
      [
        'table,column,not_null,unique,primary_key,type,references_table,references_column',
        'items,id,true,false,true,int,,',
        'items,label,true,true,false,string,,',
        '',
      ].join('\n'),
    );
    await write('items.csv', 'id,label\n1,apple\n2,\n');

    await expect(
      runValidate({ ...DEFAULT_VALIDATE_CONFIG, schema: join(dir, 'schema.csv'), dataDir: dir }),
    ).rejects.toThrow("'items'.'label' line 3: Found null value in not-null column");
  });

  it('should check a schema without reading data', async () => {
    const tables = await runCheck({ schema: join(dir, 'schema.yaml') });
    expect([...tables.keys()]).toEqual(['users', 'orders']);

    await write(
      'bad.yaml',
      `- name: users
  primary_key: id
  columns: [{ name: id, type: string }]
- name: orders
  foreign_keys: [{ local_column: user_id, foreign_table: users, foreign_column: id }]
  columns: [{ name: user_id, type: int }]
`,
    );
    await expect(runCheck({ schema: join(dir, 'bad.yaml') })).rejects.toBeInstanceOf(SchemaError);
  });

  it('should reject an invalid delimiter before loading the schema', async () => {
    await expect(runCheck({ schema: join(dir, 'schema.yaml'), delimiter: '' })).rejects.toThrow(
      new ConfigError("Delimiter must be a single character, got ''"),
    );
    await expect(
      runCheck({ schema: join(dir, 'missing.csv'), delimiter: '"' }),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
