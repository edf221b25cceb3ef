import * as readline from 'readline';
import { ValidationError } from './errors';

export interface Prompt {
  ask(question: string): Promise<string>;
  askHidden(question: string): Promise<string>;
  close(): void;
}

type PromptInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

interface Waiter {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

interface LineReader {
  next(question: string): Promise<string>;
  close(): void;
}

function inputEnded(): ValidationError {
  return new ValidationError('Input ended before an answer was given');
}

// Buffers lines so that several answers arriving in one chunk are not lost.
function createLineReader(input: PromptInput, output: NodeJS.WritableStream): LineReader {
  const rl = readline.createInterface({ input, terminal: false });
  const lines: string[] = [];
  const waiters: Waiter[] = [];
  let closed = false;

  rl.on('line', (line) => {
    const waiter = waiters.shift();
    if (waiter) {
      waiter.resolve(line);
    } else {
      lines.push(line);
    }
  });

  rl.on('close', () => {
    closed = true;
    for (const waiter of waiters.splice(0)) {
      waiter.reject(inputEnded());
    }
  });

  return {
    next(question) {
      output.write(question);
      const buffered = lines.shift();
      if (buffered !== undefined) return Promise.resolve(buffered);
      if (closed) return Promise.reject(inputEnded());
      return new Promise((resolve, reject) => {
        waiters.push({ resolve, reject });
      });
    },
    close() {
      rl.close();
    }
  };
}

export function createPrompt(input: PromptInput = process.stdin, output: NodeJS.WritableStream = process.stdout): Prompt {
  let reader: LineReader | undefined;

  function ask(question: string): Promise<string> {
    reader ??= createLineReader(input, output);
    return reader.next(question);
  }

  function readHidden(question: string): Promise<string> {
    output.write(question);

    return new Promise((resolve, reject) => {
      const wasRaw = input.isRaw ?? false;
      input.setRawMode?.(true);

      let secret = '';

      const finish = () => {
        input.setRawMode?.(wasRaw);
        input.removeListener('data', onData);
        input.removeListener('end', onEnd);
        input.removeListener('error', onError);
        input.pause();
        output.write('\n');
      };

      const onEnd = () => {
        finish();
        reject(inputEnded());
      };

      const onError = (error: Error) => {
        finish();
        reject(new ValidationError(`Unable to read input: ${error.message}`, { cause: error }));
      };

      const onData = (chunk: Buffer) => {
        for (const c of chunk.toString('utf8')) {
          switch (c) {
            case '\n':
            case '\r':
            case '\u0004':
              finish();
              resolve(secret);
              return;
            case '\u0003':
              finish();
              reject(new ValidationError('Input cancelled'));
              return;
            case '\u007F':
            case '\b':
              secret = secret.slice(0, -1);
              break;
            default:
              secret += c;
              break;
          }
        }
      };

      input.on('data', onData);
      input.once('end', onEnd);
      input.once('error', onError);
      input.resume();
    });
  }

  function askHidden(question: string): Promise<string> {
    // Piped input is never echoed, so it shares the line reader.
    if (!input.isTTY) {
      return ask(question);
    }

    // readline would echo the keystrokes, so the TTY is read directly.
    reader?.close();
    reader = undefined;
    return readHidden(question);
  }

  return {
    ask,
    askHidden,
    close: () => {
      reader?.close();
      reader = undefined;
    }
  };
}
