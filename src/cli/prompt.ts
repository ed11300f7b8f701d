import { createInterface } from 'readline';
import type { RunLog } from '../types/Product.js';

export interface Prompter {
  ask(question: string): Promise<string>;
  /** Resolves when the operator presses Ctrl+C */
  interrupted(): Promise<void>;
  close(): void;
}

export function createConsolePrompter(): Prompter {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  let closed = false;
  let rejectPending: ((reason: Error) => void) | null = null;

  rl.on('close', () => {
    closed = true;
    rejectPending?.(new Error('Input stream closed'));
    rejectPending = null;
  });

  return {
    ask: (question) =>
      new Promise((resolve, reject) => {
        if (closed) {
          reject(new Error('Input stream closed'));
          return;
        }
        rejectPending = reject;
        rl.question(question, (answer) => {
          rejectPending = null;
          resolve(answer);
        });
      }),
    interrupted: () =>
      new Promise((resolve) => {
        rl.once('SIGINT', () => resolve());
      }),
    close: () => rl.close(),
  };
}

/** Re-asks until the answer is y/yes or n/no. */
export async function confirm(prompter: Prompter, question: string, log: RunLog): Promise<boolean> {
  for (;;) {
    const answer = (await prompter.ask(question)).trim().toLowerCase();
    if (answer === 'y' || answer === 'yes') return true;
    if (answer === 'n' || answer === 'no') return false;
    log.log("Invalid answer. Please type 'y' for yes or 'n' for no.");
  }
}
