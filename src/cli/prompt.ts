import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';
import type { Prompter } from '../session/credentials.js';

class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

function question(
  input: NodeJS.ReadableStream,
  target: NodeJS.WritableStream,
  text: string,
  hidden: boolean
): Promise<string> {
  const output = new MutableOutput(target);
  const rl = createInterface({ input, output, terminal: true });

  return new Promise((resolve, reject) => {
    let answered = false;

    // Ctrl+C in raw mode arrives here instead of as a process signal.
    rl.once('SIGINT', () => rl.close());
    rl.once('close', () => {
      if (!answered) reject(new Error('input closed before an answer was given'));
    });

    rl.question(text, (answer) => {
      answered = true;
      rl.close();
      if (hidden) target.write('\n');
      resolve(hidden ? answer : answer.trim());
    });
    // The question text is already written; everything typed after it stays off screen.
    output.muted = hidden;
  });
}

export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  return {
    ask: (text) => question(input, output, text, false),
    askHidden: (text) => question(input, output, text, true),
  };
}

export const terminalPrompter: Prompter = createPrompter();
