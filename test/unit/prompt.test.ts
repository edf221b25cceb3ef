import { PassThrough } from 'stream';
import { describe, expect, it, vi } from 'vitest';
import { createPrompt, ValidationError } from '@shared';

function collect(stream: PassThrough): () => string {
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
  return () => chunks.join('');
}

function createTerminalInput() {
  return Object.assign(new PassThrough(), { isTTY: true, isRaw: false, setRawMode: vi.fn() });
}

describe('createPrompt with piped input', () => {
  it('reads a visible answer', async () => {
    const input = new PassThrough();
    const prompt = createPrompt(input, new PassThrough());

    const answer = prompt.ask('User: ');
    input.write('listener@example.com\n');

    await expect(answer).resolves.toBe('listener@example.com');
    prompt.close();
  });

  it('reads both answers when they arrive in one chunk', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = collect(output);
    const prompt = createPrompt(input, output);

    input.write('listener@example.com\ntest-secret\n');

    await expect(prompt.ask('User: ')).resolves.toBe('listener@example.com');
    await expect(prompt.askHidden('Password: ')).resolves.toBe('test-secret');
    expect(written()).toBe('User: Password: ');
    prompt.close();
  });

  it('rejects a pending answer when the input ends', async () => {
    const input = new PassThrough();
    const prompt = createPrompt(input, new PassThrough());

    input.write('listener@example.com\n');
    await expect(prompt.ask('User: ')).resolves.toBe('listener@example.com');

    const password = prompt.askHidden('Password: ');
    input.end();

    await expect(password).rejects.toThrow('Input ended before an answer was given');
    await expect(prompt.ask('Again: ')).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('createPrompt with a terminal', () => {
  it('reads a hidden answer in raw mode without echoing it', async () => {
    const input = createTerminalInput();
    const output = new PassThrough();
    const written = collect(output);
    const prompt = createPrompt(input, output);

    const answer = prompt.askHidden('Password: ');
    input.write('test-secreX\u007Ft\r');

    await expect(answer).resolves.toBe('test-secret');
    expect(written()).toBe('Password: \n');
    expect(input.setRawMode).toHaveBeenNthCalledWith(1, true);
    expect(input.setRawMode).toHaveBeenLastCalledWith(false);
  });

  it('rejects when the hidden prompt is cancelled', async () => {
    const input = createTerminalInput();
    const prompt = createPrompt(input, new PassThrough());

    const answer = prompt.askHidden('Password: ');
    input.write('\u0003');

    await expect(answer).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects when the input ends before a newline', async () => {
    const input = createTerminalInput();
    const prompt = createPrompt(input, new PassThrough());

    const answer = prompt.askHidden('Password: ');
    input.end('test-sec');

    await expect(answer).rejects.toThrow('Input ended before an answer was given');
  });

  it('rejects when the input fails', async () => {
    const input = createTerminalInput();
    const prompt = createPrompt(input, new PassThrough());

    const answer = prompt.askHidden('Password: ');
    input.emit('error', new Error('EIO'));

    await expect(answer).rejects.toThrow('Unable to read input: EIO');
  });
});
