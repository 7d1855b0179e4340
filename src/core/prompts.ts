import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';

type PromptName = 'intent_classifier';

const PROMPT_FILES: Record<PromptName, string> = {
  intent_classifier: 'intent_classifier.md',
};

const memo = new Map<PromptName, string>();

function promptsDir(): string {
  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));
  return candidates.find((c) => fs.existsSync(c)) ?? path.join(process.cwd(), 'src', 'prompts');
}

/**
 * Loads a prompt template once per process. Throws when the file is missing
 * or empty.
 */
export async function getPrompt(name: PromptName): Promise<string> {
  const cached = memo.get(name);
  if (cached !== undefined) return cached;

  const file = path.join(promptsDir(), PROMPT_FILES[name]);
  const text = (await readFile(file, 'utf-8')).trim();
  if (!text) throw new Error(`prompt_empty:${name}`);
  memo.set(name, text);
  return text;
}

/** Replaces `{{key}}` placeholders; unknown keys are left as they are. */
export function renderPrompt(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (match: string, key: string) => vars[key] ?? match);
}
