/**
 * Placeholder substitution for template texts.
 */

import type { RawValues } from '../types/assessment';

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export interface RenderResult {
  text: string;
  /** Placeholders with no value; when non-empty `text` is the template unchanged */
  missing: string[];
}

/**
 * Placeholder names used by a template, in order of first appearance.
 */
export function placeholdersOf(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (!names.includes(match[1])) names.push(match[1]);
  }
  return names;
}

/**
 * Fill `{name}` placeholders from `values`. All or nothing: if any
 * placeholder has no value the template comes back as written.
 */
export function renderTemplate(template: string, values: Readonly<RawValues>): RenderResult {
  const missing = placeholdersOf(template).filter((name) => !Object.hasOwn(values, name));
  if (missing.length > 0) {
    return { text: template, missing };
  }

  const text = template.replace(PLACEHOLDER, (_, name: string) => String(values[name]));
  return { text, missing };
}
