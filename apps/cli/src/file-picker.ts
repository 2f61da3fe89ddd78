import { createInterface } from 'node:readline/promises';

export type Prompt = (question: string) => Promise<string>;

/** Ask once on stdin/stdout. */
export const terminalPrompt: Prompt = async (question) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
};

/** Drag-and-drop into a terminal wraps paths in quotes. */
export function cleanPath(input: string): string {
  return input.trim().replace(/^(['"])(.*)\1$/, '$2').trim();
}

/**
 * The CV to process: first positional argument, otherwise asked for.
 * Returns null when the user gives nothing (the cancelled-picker case).
 */
export async function resolveDocumentPath(
  args: string[],
  prompt: Prompt = terminalPrompt,
): Promise<string | null> {
  const positional = args.find((arg) => !arg.startsWith('-'));
  const answer = positional ?? (await prompt('Path to your CV (PDF): '));
  const cleaned = cleanPath(answer);
  return cleaned || null;
}
