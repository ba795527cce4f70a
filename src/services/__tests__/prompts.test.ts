import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  GENERIC_TEMPLATE_FILE,
  LOCAL_SQL_PROMPT,
  PromptLibrary,
  STRICT_SQL_PROMPT,
  renderPrompt,
  templateFileFor,
} from '../prompts.js';

const CONTEXT = {
  schema: 'orders(id, total)',
  question: 'top orders',
  rowLimit: 5,
  dialect: 'postgres',
} as const;

describe('renderPrompt', () => {
  it('fills every placeholder', () => {
    expect(renderPrompt('{dialect} | {schema} | {question} | {row_limit}', CONTEXT)).toBe(
      'PostgreSQL | orders(id, total) | top orders | 5'
    );
  });

  it('leaves placeholders inside values untouched', () => {
    const text = renderPrompt('Q: {question} S: {schema}', {
      ...CONTEXT,
      question: 'what is {schema}?',
    });
    expect(text).toBe('Q: what is {schema}? S: orders(id, total)');
  });
});

describe('PromptLibrary', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'prompts-'));
    await writeFile(join(dir, GENERIC_TEMPLATE_FILE), 'generic {question}\n');
    await writeFile(join(dir, templateFileFor('groq')), '  groq {question}  ');
    await writeFile(join(dir, templateFileFor('openai')), '\n\n');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses the built-in templates without a prompt directory', () => {
    const library = new PromptLibrary();
    expect(library.templateFor('gemini')).toBe(STRICT_SQL_PROMPT);
    expect(library.templateFor('ollama')).toBe(LOCAL_SQL_PROMPT);
  });

  it('prefers a provider file over the shared file', () => {
    const library = new PromptLibrary({ promptDir: dir });
    expect(library.build('groq', CONTEXT)).toBe('groq top orders');
    expect(library.build('anthropic', CONTEXT)).toBe('generic top orders');
  });

  it('skips empty template files', () => {
    const library = new PromptLibrary({ promptDir: dir });
    expect(library.templateFor('openai')).toBe('generic {question}');
  });

  it('renders the built-in rules with the row limit and dialect', () => {
    const prompt = new PromptLibrary().build('ollama', { ...CONTEXT, dialect: 'mysql' });
    expect(prompt.split('\n')[0]).toBe('You are a SQL expert. Generate clean MySQL SQL queries.');
    expect(prompt).toContain('2. Add LIMIT 5 to SELECT queries that do not count rows');
  });
});
