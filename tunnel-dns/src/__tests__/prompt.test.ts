import { describe, it, expect, beforeEach } from 'vitest';
import { once } from 'node:events';
import { PassThrough } from 'node:stream';
import { EmptyInputError } from '@tunnel-dns/core';
import { createPrompter, type Prompter } from '../prompt.js';

describe('createPrompter', () => {
  let input: PassThrough;
  let output: PassThrough;
  let prompter: Prompter;

  const written = () => String(output.read() ?? '');

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    prompter = createPrompter({ input, output });
  });

  describe('ask', () => {
    it('resolves with the typed line', async () => {
      const answer = prompter.ask('Enter server IP address: ');
      input.write('203.0.113.5\n');

      await expect(answer).resolves.toBe('203.0.113.5');
      expect(written()).toBe('Enter server IP address: ');
    });

    it('rejects with EmptyInputError when input ends before an answer', async () => {
      const answer = prompter.ask('Enter your Cloudflare Email: ');
      input.end();

      const err = await answer.catch((e: unknown) => e);
      expect(err).toBeInstanceOf(EmptyInputError);
      expect((err as EmptyInputError).message).toBe('Input closed before an answer was given');
    });

    it('rejects at once when input has already ended', async () => {
      input.resume();
      input.end();
      await once(input, 'end');

      await expect(prompter.ask('Select domain by number (1-2): ')).rejects.toThrow(
        'Input closed before an answer was given',
      );
      expect(written()).toBe('Select domain by number (1-2): \n');
    });
  });

  describe('askSecret', () => {
    it('masks each character', async () => {
      const secret = prompter.askSecret('Enter your Cloudflare API Key: ');
      input.write('test-key\n');

      await expect(secret).resolves.toBe('test-key');
      expect(written()).toBe('Enter your Cloudflare API Key: ********\n');
    });

    it('applies backspace', async () => {
      const secret = prompter.askSecret('Key: ');
      input.write('abc\u007fd\r');
      await expect(secret).resolves.toBe('abd');
    });

    it('rejects when input ends', async () => {
      const secret = prompter.askSecret('Key: ');
      input.end();
      await expect(secret).rejects.toThrow(EmptyInputError);
    });

    it('treats Ctrl-D as end of input', async () => {
      const secret = prompter.askSecret('Key: ');
      input.write('ab\u0004');
      await expect(secret).rejects.toThrow('Input closed before an answer was given');
    });

    it('treats Ctrl-C as a cancel', async () => {
      const secret = prompter.askSecret('Key: ');
      input.write('ab\u0003');
      await expect(secret).rejects.toThrow('Input cancelled');
    });
  });
});
