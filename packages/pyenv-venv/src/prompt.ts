import { createInterface } from 'readline';

/** Ask a question and resolve with the raw answer */
export type AskFn = (question: string) => Promise<string>;

export const ask: AskFn = (question) => {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
};

/** Only an answer starting with y or Y counts as consent */
export function isYes(answer: string): boolean {
  return /^[yY]/.test(answer.trim());
}
