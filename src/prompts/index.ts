/**
 * Prompt templates
 *
 * Templates are markdown files under prompts/ at the package root, with
 * {{variable}} placeholders.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';

export type PromptName = 'distill-topics' | 'compose-post';

export function getPromptsDir(): string {
  return join(__dirname, '..', '..', 'prompts');
}

export async function loadPromptTemplate(name: PromptName, templatePath?: string): Promise<string> {
  return readFile(templatePath ?? join(getPromptsDir(), `${name}.md`), 'utf-8');
}

const PLACEHOLDER = /\{\{\s*([a-z_]+)\s*\}\}/g;
const STANDALONE_PLACEHOLDER = /^\s*\{\{\s*([a-z_]+)\s*\}\}\s*$/;

/**
 * Replace each {{key}} with its value. Unknown placeholders become empty.
 *
 * A line holding only a placeholder with an empty value is dropped from the
 * template, and the blank lines around it collapse. Substituted values are
 * inserted as given.
 */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  const kept = template.split('\n').filter((line) => {
    const key = STANDALONE_PLACEHOLDER.exec(line)?.[1];
    return key === undefined || (variables[key] ?? '') !== '';
  });
  return kept
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .replace(PLACEHOLDER, (_match, key: string) => variables[key] ?? '')
    .trim();
}
