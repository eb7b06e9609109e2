import { mkdtempSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fillTemplate } from '../../../src/core/prompts.js';

describe('fillTemplate', () => {
  it('replaces known placeholders', () => {
    expect(fillTemplate('Find {goal} for {who}', { goal: 'tacos', who: 'Sam' })).toBe('Find tacos for Sam');
  });

  it('leaves unknown placeholders and JSON braces alone', () => {
    expect(fillTemplate('{"send_email": false} {missing}', { goal: 'x' })).toBe('{"send_email": false} {missing}');
  });

  it('does not expand placeholders inside substituted text', () => {
    expect(fillTemplate('{goal} / {history}', { goal: 'about {history}', history: 'User: hi' })).toBe(
      'about {history} / User: hi',
    );
  });
});

describe('Prompt Loader', () => {
  afterEach(() => {
    delete process.env.PROMPTS_DIR;
    // Ensure a fresh module instance for each test
    jest.resetModules();
  });

  it('loads the bundled templates', async () => {
    const prompts = await import('../../../src/core/prompts.js');
    const planner = await prompts.getPrompt('query_planner');
    const drafter = await prompts.getPrompt('email_drafter');

    expect(planner).toContain('{history}');
    expect(planner).toContain('{goal}');
    expect(drafter).toContain('"send_email"');
  });

  it('renders a template with its variables and trims the result', async () => {
    const prompts = await import('../../../src/core/prompts.js');
    const rendered = await prompts.renderPrompt('email_extractor', { goal: 'mail me at a@b.test' });

    expect(rendered).toContain('User request: "mail me at a@b.test"');
    expect(rendered).not.toContain('{goal}');
    expect(rendered).toBe(rendered.trim());
  });

  it('respects PROMPTS_DIR override', async () => {
    const tmp = mkdtempSync(path.join(os.tmpdir(), 'prompts-'));
    writeFileSync(path.join(tmp, 'synthesizer.md'), 'OVERRIDE {goal}');
    process.env.PROMPTS_DIR = tmp;

    const prompts = await import('../../../src/core/prompts.js');
    await expect(prompts.renderPrompt('synthesizer', { goal: 'tea' })).resolves.toBe('OVERRIDE tea');
  });

  it('fails loudly when a template is missing', async () => {
    const tmp = mkdtempSync(path.join(os.tmpdir(), 'prompts-'));
    process.env.PROMPTS_DIR = tmp;

    const prompts = await import('../../../src/core/prompts.js');
    await expect(prompts.renderPrompt('url_selector', { goal: 'x' })).rejects.toThrow(
      'Prompt template "url_selector" is missing or empty',
    );
  });
});
