import { createInterface } from 'readline/promises';
import type { Readable, Writable } from 'stream';

/**
 * The human on the other side of the interactive authorization step
 */
export interface OperatorConsole {
  showAuthorizationUrl(url: string): Promise<void>;
  readRedirectUrl(): Promise<string>;
}

/**
 * Prints to stdout and reads one pasted line from stdin
 */
export class TerminalConsole implements OperatorConsole {
  private input: Readable;
  private output: Writable;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.input = input;
    this.output = output;
  }

  async showAuthorizationUrl(url: string): Promise<void> {
    this.output.write(`Paste this into your browser to authorize this app:\n${url}\n`);
  }

  async readRedirectUrl(): Promise<string> {
    const rl = createInterface({ input: this.input, output: this.output, terminal: false });
    try {
      return await rl.question('Paste the full redirected URL:\n');
    } finally {
      rl.close();
    }
  }
}
