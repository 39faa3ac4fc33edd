import { describe, it, expect, vi } from 'vitest';
import { join } from 'path';
import {
  DEFAULT_VALIDATE_CONFIG,
  resolveValidateConfig,
  validateDelimiter,
} from '../../../src/utils/config-loader.js';
import { ConfigError } from '../../../src/utils/errors.js';

vi.mock('../../../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/utils/logger.js')>();
  return {
    ...actual,
    logger: { info: vi.fn(), error: vi.fn(), debug: vi.fn(), warn: vi.fn(), setLevel: vi.fn() },
  };
});

describe('resolveValidateConfig', () => {
  it('should apply defaults for a schema document', () => {
    expect(resolveValidateConfig({ schema: 'schema.yaml' })).toEqual({
      schema: 'schema.yaml',
      ...DEFAULT_VALIDATE_CONFIG,
    });
  });

  it('should default the data directory of a control file to its own directory', () => {
    const config = resolveValidateConfig({ schema: join('db', 'schema.csv') });
    expect(config.dataDir).toBe('db');
  });

  it('should prefer CLI options over the config file', () => {
    const config = resolveValidateConfig(
      { schema: 'cli.yaml', delimiter: '|' },
      { validate: { schema: 'file.yaml', delimiter: ';', dataDir: 'data', extension: '.tsv' } },
    );
    expect(config).toEqual({
      schema: 'cli.yaml',
      dataDir: 'data',
      extension: '.tsv',
      delimiter: '|',
    });
  });

  it('should fall back to the config file for the schema path', () => {
    expect(resolveValidateConfig({}, { validate: { schema: 'file.yaml' } }).schema).toBe('file.yaml');
  });

  it('should require a schema path', () => {
    expect(() => resolveValidateConfig({}, {})).toThrow(ConfigError);
  });

  it('should reject invalid delimiters', () => {
    expect(() => resolveValidateConfig({ schema: 's.yaml', delimiter: ';;' })).toThrow(
      "Delimiter must be a single character, got ';;'",
    );
    expect(() => resolveValidateConfig({ schema: 's.yaml', delimiter: '"' })).toThrow(ConfigError);
  });
});

describe('validateDelimiter', () => {
  it('should accept single non-quote characters', () => {
    expect(() => validateDelimiter(';')).not.toThrow();
    expect(() => validateDelimiter('\t')).not.toThrow();
  });

  it('should reject empty, multi-character, quote and newline delimiters', () => {
    expect(() => validateDelimiter('')).toThrow("Delimiter must be a single character, got ''");
    expect(() => validateDelimiter('||')).toThrow(ConfigError);
    expect(() => validateDelimiter('"')).toThrow('Delimiter cannot be a quote or newline character');
    expect(() => validateDelimiter('\n')).toThrow(ConfigError);
  });
});
