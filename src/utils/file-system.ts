/**
 * File system operations used by the loaders and the CLI.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories as needed.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * List the files in a directory with the given extension, sorted by name.
 * Returns an empty list when the directory does not exist.
 */
export async function listFiles(dirPath: string, extension: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.promises.readdir(dirPath);
  } catch {
    return [];
  }
  return entries.filter((entry) => entry.endsWith(extension)).sort();
}

/**
 * Expand glob patterns into absolute file paths.
 * Plain paths without glob characters are passed through untouched so that
 * a missing file is reported by the reader rather than silently dropped.
 */
export async function globFiles(
  patterns: string[],
  options: { cwd?: string; ignore?: string[] } = {}
): Promise<string[]> {
  const cwd = options.cwd || process.cwd();
  const literal = patterns.filter((pattern) => !fg.isDynamicPattern(pattern));
  const dynamic = patterns.filter((pattern) => fg.isDynamicPattern(pattern));

  const matched = dynamic.length > 0
    ? await fg(dynamic, {
      cwd,
      ignore: options.ignore || ['**/node_modules/**', '**/dist/**'],
      absolute: true,
      onlyFiles: true,
    })
    : [];

  const all = [...literal.map((p) => path.resolve(cwd, p)), ...matched];
  return [...new Set(all)].sort();
}
