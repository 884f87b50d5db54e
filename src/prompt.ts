import { createInterface } from 'node:readline/promises';
import type { Prompter } from './types.js';

/** Asks on stdout and reads one line from stdin per question. */
export class TerminalPrompter implements Prompter {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async prompt(question: string): Promise<string> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      return await rl.question(`${question} `);
    } finally {
      rl.close();
    }
  }
}

export function terminalPrompter(): Prompter | undefined {
  return process.stdin.isTTY ? new TerminalPrompter() : undefined;
}
