/**
 * Tests for the templates command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    red: (s: string) => s,
  },
}));

import { createTemplatesCommand } from '../../../../src/cli/commands/templates.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';

describe('templates command', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should list bundled templates with the targets they serve', async () => {
    await createTemplatesCommand().parseAsync([], { from: 'user' });

    expect(vi.mocked(console.log).mock.calls.map((call) => call[0])).toEqual([
      'compare-to (default for compareTo)',
      'string-builder',
      'string-concat (default for toString)',
    ]);
  });

  it('should list templates as JSON', async () => {
    await createTemplatesCommand().parseAsync(['--json'], { from: 'user' });

    const printed: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(printed).toEqual([
      expect.objectContaining({ name: 'compare-to' }),
      expect.objectContaining({ name: 'string-builder' }),
      expect.objectContaining({ name: 'string-concat' }),
    ]);
  });

  it('should print a template source', async () => {
    await createTemplatesCommand().parseAsync(['string-concat'], { from: 'user' });

    expect(String(vi.mocked(console.log).mock.calls[0][0]).split('\n')[0]).toBe('/**');
  });

  it('should exit with 1 for an unknown template', async () => {
    await expect(createTemplatesCommand().parseAsync(['fancy'], { from: 'user' })).rejects.toThrow(
      'process.exit called'
    );

    expect(console.error).toHaveBeenCalledWith(
      `[ERROR] ${ErrorCodes.TEMPLATE_NOT_FOUND}: Template 'fancy' not found. Bundled templates: compare-to, string-builder, string-concat`
    );
  });
});
