import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { EmptyInputError } from '@tunnel-dns/core';

export interface Prompter {
  ask(question: string): Promise<string>;
  /** Read a value without echoing it */
  askSecret(question: string): Promise<string>;
}

/** stdin, or any readable standing in for it */
export type PromptInput = Readable & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export interface PromptStreams {
  input: PromptInput;
  output: Writable;
}

const INPUT_CLOSED = 'Input closed before an answer was given';
const INPUT_CANCELLED = 'Input cancelled';

/**
 * Prompts that reject with EmptyInputError when input ends (Ctrl-D, a closed
 * pipe) or the user presses Ctrl-C, so the wizard can report it and exit 1.
 */
export function createPrompter(
  { input, output }: PromptStreams = { input: process.stdin, output: process.stdout },
): Prompter {
  /**
   * Visible prompt. A temporary readline per call keeps it
   * out of the way of raw-mode askSecret.
   */
  function ask(question: string): Promise<string> {
    return new Promise((resolve, reject) => {
      if (input.readableEnded) {
        output.write(`${question}\n`);
        reject(new EmptyInputError(INPUT_CLOSED));
        return;
      }

      const rl = createInterface({ input, output });
      let settled = false;

      rl.on('SIGINT', () => {
        settled = true;
        output.write('\n');
        rl.close();
        reject(new EmptyInputError(INPUT_CANCELLED));
      });
      rl.on('close', () => {
        if (settled) return;
        settled = true;
        output.write('\n');
        reject(new EmptyInputError(INPUT_CLOSED));
      });
      rl.question(question, answer => {
        settled = true;
        rl.close();
        resolve(answer);
      });
    });
  }

  /** Masked prompt: raw mode on a TTY, each character echoed as `*` */
  function askSecret(question: string): Promise<string> {
    return new Promise((resolve, reject) => {
      output.write(question);
      if (input.readableEnded) {
        output.write('\n');
        reject(new EmptyInputError(INPUT_CLOSED));
        return;
      }

      const raw = input.isTTY === true;
      if (raw) input.setRawMode?.(true);
      let value = '';

      const finish = (err?: EmptyInputError) => {
        if (raw) input.setRawMode?.(false);
        input.removeListener('data', onData);
        input.removeListener('end', onEnd);
        input.pause();
        output.write('\n');
        if (err) reject(err);
        else resolve(value);
      };
      const onEnd = () => finish(new EmptyInputError(INPUT_CLOSED));
      const onData = (chunk: Buffer | string) => {
        // A paste arrives as one chunk
        for (const ch of chunk.toString()) {
          if (ch === '\n' || ch === '\r') return finish();
          if (ch === '\u0003') return finish(new EmptyInputError(INPUT_CANCELLED));
          if (ch === '\u0004') return finish(new EmptyInputError(INPUT_CLOSED));
          if (ch === '\u007f' || ch === '\b') {
            if (value.length > 0) {
              value = value.slice(0, -1);
              output.write('\b \b');
            }
            continue;
          }
          value += ch;
          output.write('*');
        }
      };

      input.on('data', onData);
      input.once('end', onEnd);
      input.resume();
    });
  }

  return { ask, askSecret };
}
