/**
 * Terminal SelectionIO over node:readline.
 *
 * Lines are queued as they arrive, so answers piped in ahead of the
 * prompts are not lost. End of input and Ctrl-C resolve pending and
 * future questions with null.
 */

import * as readline from 'readline';
import { SelectionIO } from './selectionController';

export class TerminalSelectionIO implements SelectionIO {
  private readonly rl: readline.Interface;
  private readonly lines: string[] = [];
  private waiting?: (answer: string | null) => void;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    const interactive = 'isTTY' in input && input.isTTY === true;
    this.rl = readline.createInterface({ input, output, terminal: interactive });

    this.rl.on('line', line => {
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = undefined;
        resolve(line);
      } else {
        this.lines.push(line);
      }
    });

    this.rl.on('close', () => {
      this.closed = true;
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = undefined;
        resolve(null);
      }
    });

    this.rl.on('SIGINT', () => this.rl.close());
  }

  write(text: string): void {
    this.output.write(`${text}\n`);
  }

  ask(prompt: string): Promise<string | null> {
    if (this.closed) {
      this.output.write(prompt);
    } else {
      this.rl.setPrompt(prompt);
      this.rl.prompt();
    }

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      this.output.write('\n');
      return Promise.resolve(null);
    }
    return new Promise(resolve => {
      this.waiting = resolve;
    });
  }

  close(): void {
    this.rl.close();
  }
}
