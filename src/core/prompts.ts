import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';

const PROMPT_NAMES = [
  'email_extractor',
  'location_needed',
  'location_present',
  'query_planner',
  'url_selector',
  'snippet_summary',
  'synthesizer',
  'email_drafter',
] as const;

export type PromptName = (typeof PROMPT_NAMES)[number];

let loaded = false;
const PROMPTS: Partial<Record<PromptName, string>> = {};

async function loadFileSafe(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch {
    return '';
  }
}

function promptsDir(): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  // dist/core when built; the templates stay in src/prompts
  candidates.push(path.join(__dirname, '..', '..', 'src', 'prompts'));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  return candidates.find((c) => fs.existsSync(c)) ?? path.join(process.cwd(), 'src', 'prompts');
}

export async function preloadPrompts(): Promise<void> {
  if (loaded) return;
  const base = promptsDir();
  await Promise.all(
    PROMPT_NAMES.map(async (name) => {
      PROMPTS[name] = await loadFileSafe(path.join(base, `${name}.md`));
    }),
  );
  loaded = true;
}

export async function getPrompt(name: PromptName): Promise<string> {
  if (!loaded) await preloadPrompts();
  return PROMPTS[name] ?? '';
}

/**
 * Fills `{placeholder}` slots in one pass, so text inserted for one slot is
 * never re-expanded. Unknown placeholders are left as written.
 */
export function fillTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] ?? match : match,
  );
}

export async function renderPrompt(name: PromptName, vars: Record<string, string>): Promise<string> {
  const template = await getPrompt(name);
  if (!template.trim()) {
    throw new Error(`Prompt template "${name}" is missing or empty`);
  }
  return fillTemplate(template, vars).trim();
}
