/**
 * Bundled template lookup.
 *
 * Templates ship as `templates/<name>.hbs` at the package root. A template
 * reference is either a bundled name or a path to a file.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { fileExists, listFiles, readFile } from '../../utils/file-system.js';
import { TemplateError, ErrorCodes } from '../../utils/errors.js';
import type { TemplateResource } from './types.js';

const TEMPLATE_EXTENSION = '.hbs';

/** Package root: src/core/template (or dist/core/template) is three levels down. */
export const BUNDLED_TEMPLATE_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../../templates'
);

export async function listTemplates(templateDir: string = BUNDLED_TEMPLATE_DIR): Promise<TemplateResource[]> {
  const files = await listFiles(templateDir, TEMPLATE_EXTENSION);
  return files.map((file) => ({
    name: path.basename(file, TEMPLATE_EXTENSION),
    path: path.join(templateDir, file),
  }));
}

/**
 * Resolve a template reference to its source text. A path (relative to
 * `cwd`) wins over a bundled template of the same name.
 */
export async function loadTemplate(
  reference: string,
  cwd: string = process.cwd(),
  templateDir: string = BUNDLED_TEMPLATE_DIR
): Promise<TemplateResource & { source: string }> {
  const asPath = path.resolve(cwd, reference);
  if (await fileExists(asPath)) {
    return { name: path.basename(asPath, TEMPLATE_EXTENSION), path: asPath, source: await readFile(asPath) };
  }

  const bundled = path.join(templateDir, `${reference}${TEMPLATE_EXTENSION}`);
  if (await fileExists(bundled)) {
    return { name: reference, path: bundled, source: await readFile(bundled) };
  }

  const available = (await listTemplates(templateDir)).map((t) => t.name);
  throw new TemplateError(
    ErrorCodes.TEMPLATE_NOT_FOUND,
    `Template '${reference}' not found. Bundled templates: ${available.join(', ') || 'none'}`,
    { reference, available }
  );
}
