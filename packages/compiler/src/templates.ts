/**
 * Template loading on top of nunjucks (Jinja-compatible syntax).
 *
 * Autoescaping is off: the rendered output is XML and the macro strings
 * are inserted verbatim.
 */

import nunjucks from 'nunjucks';
import type { Template } from 'nunjucks';

import { readSource } from './loader';

const environment = new nunjucks.Environment(null, { autoescape: false });

export type { Template };

/**
 * Compile a template file. A missing file is a NotFoundError.
 */
export function loadTemplate(path: string): Template {
  return new nunjucks.Template(readSource(path), environment, path, true);
}

