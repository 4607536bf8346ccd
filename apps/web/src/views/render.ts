/**
 * HTML views
 *
 * Templates live next to this file; `{{name}}` placeholders are replaced with
 * HTML-escaped values. Unknown placeholders render as empty strings.
 */

import { readFileSync } from 'node:fs';

export type ViewName = 'index' | 'success';

const templates = new Map<ViewName, string>();

function template(name: ViewName): string {
  let source = templates.get(name);
  if (source === undefined) {
    source = readFileSync(new URL(`./${name}.html`, import.meta.url), 'utf8');
    templates.set(name, source);
  }
  return source;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function renderTemplate(source: string, values: Record<string, string | undefined>): string {
  return source.replace(/\{\{\s*(\w+)\s*\}\}/g, (_match, key: string) => escapeHtml(values[key] ?? ''));
}

export function renderView(name: ViewName, values: Record<string, string | undefined> = {}): string {
  return renderTemplate(template(name), values);
}
