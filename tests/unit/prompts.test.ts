/**
 * Unit tests for the Prompts Module
 */

import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildPrompt, compilePrompt, getPromptsDir, loadPromptTemplate } from '../../src/prompts/index.js';

describe('Prompts Module', () => {
  describe('compilePrompt()', () => {
    test('substitutes every occurrence of a placeholder', () => {
      expect(compilePrompt('{{a}} and {{a}} then {{b}}', { a: 'x', b: 'y' })).toBe('x and x then y');
    });

    test('leaves unknown placeholders and single braces untouched', () => {
      expect(compilePrompt('{{known}} {{unknown}} {page}', { known: 'v' })).toBe('v {{unknown}} {page}');
    });
  });

  describe('bundled templates', () => {
    test('resolves the prompts directory', () => {
      expect(existsSync(join(getPromptsDir(), 'discovery.md'))).toBe(true);
    });

    test.each(['discovery', 'extraction', 'integration'] as const)('%s template declares its schema hint', async (name) => {
      const template = await loadPromptTemplate(name);

      expect(template).toContain('{{schema_hint}}');
      expect(template).toContain('{{requirements}}');
    });

    test('extraction prompt names the page', async () => {
      const prompt = await buildPrompt('extraction', {
        page_url: 'https://example.com/a',
        page_title: 'Page A',
        requirements: 'titles',
        schema_hint: '{}',
      });

      expect(prompt).toContain('URL: https://example.com/a\nTitle: Page A');
      expect(prompt).not.toContain('{{');
    });
  });

  describe('custom directory', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'prompts-'));
      await writeFile(join(dir, 'integration.md'), 'Fields: {{field_names}}', 'utf-8');
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    test('loads templates from the given directory', async () => {
      await expect(buildPrompt('integration', { field_names: 'a, b' }, dir)).resolves.toBe('Fields: a, b');
    });

    test('rejects when the template file is missing', async () => {
      await expect(loadPromptTemplate('discovery', dir)).rejects.toThrow();
    });
  });
});
