/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema } from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';

const schema = z.object({
  name: z.string(),
  count: z.number().default(1),
});

describe('parseYaml', () => {
  it('should parse valid YAML', () => {
    expect(parseYaml('name: Person\ncount: 2')).toEqual({ name: 'Person', count: 2 });
  });

  it('should parse JSON as YAML', () => {
    expect(parseYaml('{"name": "Person"}')).toEqual({ name: 'Person' });
  });

  it('should throw a parse error for invalid YAML', () => {
    let caught: unknown;
    try {
      parseYaml('name: [unclosed');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SystemError);
    expect(caught).toMatchObject({ code: ErrorCodes.PARSE_ERROR });
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: Person', schema)).toEqual({ name: 'Person', count: 1 });
  });

  it('should report the failing path', () => {
    expect(() => parseYamlWithSchema('count: 3', schema)).toThrow(/^YAML validation failed: name: /);
  });
});

describe('loadYamlWithSchema', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'genmethod-yaml-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load and validate a file', async () => {
    const file = path.join(tempDir, 'model.yaml');
    fs.writeFileSync(file, 'name: Person\ncount: 4\n');

    await expect(loadYamlWithSchema(file, schema)).resolves.toEqual({ name: 'Person', count: 4 });
  });

  it('should report a missing file', async () => {
    const file = path.join(tempDir, 'missing.yaml');

    await expect(loadYamlWithSchema(file, schema)).rejects.toMatchObject({
      code: ErrorCodes.FILE_NOT_FOUND,
      message: `Failed to read YAML file: ${file}`,
    });
  });

  it('should name the file in validation errors', async () => {
    const file = path.join(tempDir, 'bad.yaml');
    fs.writeFileSync(file, 'count: 4\n');

    await expect(loadYamlWithSchema(file, schema)).rejects.toThrow(`(file: ${file})`);
  });
});
