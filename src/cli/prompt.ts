import readline from 'node:readline';
import type { ShellIO } from '../mcp/client/shell.js';

export interface Prompter extends ShellIO {
  close(): void;
}

/**
 * Line prompts on stdin; `ask` resolves undefined once stdin ends
 */
export function createPrompter(): Prompter {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY,
  });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  return {
    ask(question: string): Promise<string | undefined> {
      if (closed) {
        return Promise.resolve(undefined);
      }
      return new Promise((resolve) => {
        const onClose = (): void => resolve(undefined);
        rl.once('close', onClose);
        rl.question(question, (answer) => {
          rl.off('close', onClose);
          resolve(answer);
        });
      });
    },
    print(text: string): void {
      process.stdout.write(`${text}\n`);
    },
    close(): void {
      rl.close();
    },
  };
}
