/**
 * core/templates.ts
 *
 * Named text templates with {{KEY}} placeholders.
 * Templates live in templates/ at the package root, next to both src/ and dist/.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { StepName } from '../types';
import { ConfigRenderError, describeError } from './errors';

export const TEMPLATE_DIR = resolve(__dirname, '../../templates');

export type TemplateName = 'supervisor.conf' | 'start.sh' | 'stop-all.sh' | 'env';

export type TemplateValues = Record<string, string | number | boolean>;

const PLACEHOLDER = /\{\{\s*([A-Z0-9_]+)\s*\}\}/g;

export function loadTemplate(name: TemplateName, dir: string = TEMPLATE_DIR, step: StepName = 'supervision'): string {
  const file = resolve(dir, `${name}.tmpl`);
  try {
    return readFileSync(file, 'utf8');
  } catch (err) {
    throw new ConfigRenderError(`Cannot read template ${file}: ${describeError(err)}`, { cause: err }, step);
  }
}

/**
 * Substitutes every placeholder. A placeholder without a value is an error,
 * never an empty string.
 */
export function renderTemplate(template: string, values: TemplateValues, step: StepName = 'supervision'): string {
  const missing = new Set<string>();

  const rendered = template.replace(PLACEHOLDER, (match, key: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, key)) {
      missing.add(key);
      return match;
    }
    return String(values[key]);
  });

  if (missing.size > 0) {
    throw new ConfigRenderError(`Template values missing for: ${[...missing].join(', ')}`, undefined, step);
  }
  return rendered;
}
