/**
 * Text helpers shared by the template engine and the model loader.
 */

/**
 * Trim surrounding blank lines, strip the common indentation and trailing
 * whitespace. The host re-indents the result.
 */
export function normalizeBlock(text: string): string {
  const lines = text.replace(/\r\n/g, '\n').split('\n').map((line) => line.trimEnd());
  while (lines.length > 0 && lines[0] === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

  const indents = lines
    .filter((line) => line.length > 0)
    .map((line) => line.length - line.trimStart().length);
  const common = indents.length > 0 ? Math.min(...indents) : 0;

  return lines.map((line) => line.slice(common)).join('\n');
}
