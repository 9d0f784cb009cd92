/**
 * Tests for text helpers.
 */
import { describe, it, expect } from 'vitest';
import { normalizeBlock } from '../../../src/utils/text.js';

describe('normalizeBlock', () => {
  it('should strip the common indentation', () => {
    expect(normalizeBlock('    a;\n        b;\n    c;')).toBe('a;\n    b;\nc;');
  });

  it('should drop surrounding blank lines and trailing whitespace', () => {
    expect(normalizeBlock('\n\n  return x;   \n\n')).toBe('return x;');
  });

  it('should keep inner blank lines empty', () => {
    expect(normalizeBlock('  a;\n   \n  b;')).toBe('a;\n\nb;');
  });

  it('should normalise CRLF line endings', () => {
    expect(normalizeBlock('  a;\r\n  b;')).toBe('a;\nb;');
  });

  it('should return an empty string for blank input', () => {
    expect(normalizeBlock('  \n \n')).toBe('');
  });
});
