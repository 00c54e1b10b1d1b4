/**
 * Interactive console prompts
 */

import { createInterface } from 'readline/promises';
import type { PromptFn } from '../providers/google-auth/index.js';

/**
 * Build a prompt that asks on `output` and reads one line from `input`
 *
 * Rejects when the input ends before an answer was given.
 */
export function createPrompt(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): PromptFn {
  return (question) =>
    new Promise<string>((resolve, reject) => {
      const rl = createInterface({ input, output });
      let answered = false;

      rl.once('close', () => {
        if (!answered) {
          reject(new Error('No input: stdin closed'));
        }
      });

      rl.question(question).then(
        (answer) => {
          answered = true;
          rl.close();
          resolve(answer);
        },
        (error: unknown) => {
          rl.close();
          reject(error);
        }
      );
    });
}

/**
 * Ask a question on stderr and read one line from stdin
 *
 * stdout is kept free for the JSON run report.
 */
export const promptLine: PromptFn = createPrompt(process.stdin, process.stderr);

/**
 * Return the given value, or ask for it until a non-empty answer is given
 */
export async function askIfMissing(
  value: string | undefined,
  question: string,
  prompt: PromptFn = promptLine
): Promise<string> {
  let answer = value?.trim() ?? '';
  while (answer.length === 0) {
    answer = (await prompt(question)).trim();
  }
  return answer;
}
