// src/lib/template.utils.ts
import fs from 'fs/promises';
import path from 'path';
import { config } from '@/config/app.config';

export const FILE_NOT_FOUND_HTML = '<html><body><h1>File not found</h1></body></html>';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

/**
 * Markup that is inserted into a template as-is.
 */
export class SafeHtml {
  constructor(readonly value: string) {}

  toString(): string {
    return this.value;
  }
}

export type Binding = string | SafeHtml;
export type Bindings = Record<string, Binding>;

const toHtml = (value: Binding | ReadonlyArray<Binding>): string => {
  if (Array.isArray(value)) {
    return value.map(toHtml).join('');
  }
  return value instanceof SafeHtml ? value.value : escapeHtml(String(value));
};

/**
 * Tagged template producing SafeHtml; every interpolated value is escaped
 * unless it is already SafeHtml. Arrays are concatenated.
 */
export const html = (strings: TemplateStringsArray, ...values: Array<Binding | ReadonlyArray<Binding>>): SafeHtml => {
  let out = strings[0];
  values.forEach((value, i) => {
    out += toHtml(value) + strings[i + 1];
  });
  return new SafeHtml(out);
};

export const raw = (value: string): SafeHtml => new SafeHtml(value);

const TOKEN_PATTERN = /\{\{\s*([a-zA-Z0-9_]+)\s*\}\}/g;

/**
 * Replaces `{{token}}` markers with their bindings. Tokens that have no
 * binding stay in the output unchanged.
 */
export const fillTemplate = (template: string, bindings: Bindings): string =>
  template.replace(TOKEN_PATTERN, (match, token: string) =>
    Object.prototype.hasOwnProperty.call(bindings, token) ? toHtml(bindings[token]) : match,
  );

export const readTemplate = async (templateName: string, templatesDir: string = config.templatesDir): Promise<string> => {
  try {
    return await fs.readFile(path.join(templatesDir, templateName), 'utf-8');
  } catch (error) {
    console.warn(`[template] Could not read ${templateName}:`, error instanceof Error ? error.message : error);
    return FILE_NOT_FOUND_HTML;
  }
};

export const render = async (
  templateName: string,
  bindings: Bindings = {},
  templatesDir: string = config.templatesDir,
): Promise<string> => fillTemplate(await readTemplate(templateName, templatesDir), bindings);
