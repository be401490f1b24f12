/**
 * Prompts Module
 *
 * Loads the per-call-site instruction templates from the `prompts/`
 * directory and compiles them with `{{variable}}` substitution.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';

export type PromptName = 'discovery' | 'extraction' | 'integration';

/**
 * Locate the prompts directory. Sources live in src/prompts and the build
 * output in dist/src/prompts, so both depths are checked before falling
 * back to the working directory.
 */
export function getPromptsDir(): string {
  const candidates = [
    process.env.PROMPTS_DIR,
    join(__dirname, '..', '..', 'prompts'),
    join(__dirname, '..', '..', '..', 'prompts'),
  ];
  for (const candidate of candidates) {
    if (candidate && existsSync(candidate)) {
      return candidate;
    }
  }
  return join(process.cwd(), 'prompts');
}

const templateCache = new Map<string, string>();

/**
 * Load a prompt template by name
 *
 * @param name - Template name (file `prompts/<name>.md`)
 * @param promptsDir - Optional directory override
 * @throws Error if the template file cannot be read
 */
export async function loadPromptTemplate(name: PromptName, promptsDir?: string): Promise<string> {
  const file = join(promptsDir ?? getPromptsDir(), `${name}.md`);
  const cached = templateCache.get(file);
  if (cached !== undefined) {
    return cached;
  }
  const template = await readFile(file, 'utf-8');
  templateCache.set(file, template);
  return template;
}

/**
 * Replace every `{{key}}` placeholder with its value. Unknown placeholders
 * are left untouched.
 */
export function compilePrompt(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] ?? placeholder : placeholder
  );
}

/**
 * Load and compile a prompt in one step
 */
export async function buildPrompt(
  name: PromptName,
  variables: Record<string, string>,
  promptsDir?: string
): Promise<string> {
  const template = await loadPromptTemplate(name, promptsDir);
  return compilePrompt(template, variables);
}
