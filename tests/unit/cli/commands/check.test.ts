/**
 * Tests for the check command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

vi.mock('chalk', () => ({
  default: {
    cyan: (s: string) => s,
    gray: (s: string) => s,
    blue: (s: string) => s,
    yellow: (s: string) => s,
    red: (s: string) => s,
    green: (s: string) => s,
  },
}));

import { createCheckCommand, runCheck } from '../../../../src/cli/commands/check.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';

const PERSON_MODEL = [
  'package: com.example',
  'classes:',
  '  - name: Person',
  '    members:',
  '      - { kind: field, name: name, type: String, modifiers: [private] }',
  '',
].join('\n');

const POINT_MODEL = [
  'package: com.example',
  'classes:',
  '  - name: Point',
  '    members:',
  '      - { kind: field, name: x, type: int, modifiers: [private] }',
  '      - { kind: method, name: toString, returns: String, modifiers: [public], body: \'return "";\' }',
  '  - name: Failure',
  '    extends: RuntimeException',
  '    members:',
  '      - { kind: field, name: code, type: int, modifiers: [private] }',
  '',
].join('\n');

describe('check command', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'genmethod-check-'));
    fs.mkdirSync(path.join(tempDir, 'models'));
    fs.writeFileSync(path.join(tempDir, 'models', 'point.model.yaml'), POINT_MODEL);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('runCheck', () => {
    it('should check every class of every matched model', async () => {
      fs.writeFileSync(path.join(tempDir, 'models', 'person.model.yaml'), PERSON_MODEL);

      const report = await runCheck(['models/*.yaml'], {}, tempDir);

      expect(report.target).toBe('toString');
      expect(report.missing).toBe(1);
      expect(report.files.map((f) => f.file)).toEqual([
        path.join('models', 'person.model.yaml'),
        path.join('models', 'point.model.yaml'),
      ]);
      expect(report.files[1].classes.map((c) => c.status)).toEqual(['present', 'skipped']);
    });

    it('should look for the configured target', async () => {
      fs.writeFileSync(path.join(tempDir, '.genmethod.yaml'), 'target: compareTo\n');

      const report = await runCheck(['models/point.model.yaml'], {}, tempDir);

      expect(report.target).toBe('compareTo');
      expect(report.missing).toBe(1);
    });

    it('should return an empty report when nothing matches', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});

      const report = await runCheck(['nowhere/*.yaml'], {}, tempDir);

      expect(report).toEqual({ target: 'toString', files: [], missing: 0 });
      expect(console.error).toHaveBeenCalledWith('[WARN] No model files matched: nowhere/*.yaml');
    });

    it('should reject an unknown target', async () => {
      await expect(runCheck(['models/*.yaml'], { target: 'hashCode' }, tempDir)).rejects.toMatchObject({
        code: ErrorCodes.CONFIG_LOAD_ERROR,
        message: "Invalid --target 'hashCode'",
      });
    });
  });

  describe('action', () => {
    beforeEach(() => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('process.exit called');
      });
      vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
    });

    it('should create a command with correct name', () => {
      expect(createCheckCommand().name()).toBe('check');
    });

    it('should pass when no class is missing the method', async () => {
      await createCheckCommand().parseAsync(['models/*.yaml'], { from: 'user' });

      expect(console.error).toHaveBeenCalledWith('✓ 2 classes checked, none missing toString()');
      expect(process.exit).not.toHaveBeenCalled();
    });

    it('should list missing classes and exit with 1', async () => {
      fs.writeFileSync(path.join(tempDir, 'models', 'person.model.yaml'), PERSON_MODEL);

      await expect(createCheckCommand().parseAsync(['models/*.yaml'], { from: 'user' })).rejects.toThrow(
        'process.exit called'
      );

      expect(console.log).toHaveBeenCalledWith(
        `${path.join('models', 'person.model.yaml')}: Class 'Person' does not override toString() method`
      );
      expect(console.error).toHaveBeenCalledWith('✗ 1 of 3 classes missing toString()');
      expect(process.exit).toHaveBeenCalledTimes(1);
      expect(process.exit).toHaveBeenCalledWith(1);
    });

    it('should print the report as JSON', async () => {
      await createCheckCommand().parseAsync(['models/*.yaml', '--json'], { from: 'user' });

      const printed: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
      expect(printed).toMatchObject({ target: 'toString', missing: 0 });
    });
  });
});
