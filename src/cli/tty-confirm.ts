import { createInterface } from 'node:readline/promises';

export const CONFIRM_PROMPT = 'CONFIRM_PROMPT';

export type ConfirmPrompt = (question: string) => Promise<boolean>;

const ACCEPTED = new Set(['y', 'yes']);

/**
 * Asks on the terminal. A session without a TTY cannot answer, which counts
 * as a refusal.
 */
export async function confirmOnTty(
  question: string,
  input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): Promise<boolean> {
  if (!input.isTTY) return false;
  const prompt = createInterface({ input, output });
  try {
    const answer = await prompt.question(`${question} [y/N] `);
    return ACCEPTED.has(answer.trim().toLowerCase());
  } finally {
    prompt.close();
  }
}
