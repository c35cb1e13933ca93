import { closeSync, createReadStream, openSync, writeSync } from 'node:fs';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { isatty, ReadStream } from 'node:tty';

import { PROMPT_TIMEOUT_MS } from '../types';

/** Asks the human a yes/no question */
export interface ConfirmationPrompt {
  confirm(message: string): Promise<boolean>;
}

/**
 * A blocking line read that gives up after a deadline.
 * Resolves null on timeout, EOF, or when no terminal is available.
 */
export interface BoundedLineReader {
  readLine(message: string, timeoutMs: number): Promise<string | null>;
}

/** Terminal device pair the prompt talks to directly, bypassing stdio */
export interface TerminalDevice {
  readonly name: string;
  readonly inputPath: string;
  readonly outputPath: string;
}

export const POSIX_TTY: TerminalDevice = {
  name: 'tty',
  inputPath: '/dev/tty',
  outputPath: '/dev/tty',
};

export const WINDOWS_CONSOLE: TerminalDevice = {
  name: 'console',
  inputPath: 'CONIN$',
  outputPath: 'CONOUT$',
};

export function selectTerminalDevice(platform: NodeJS.Platform = process.platform): TerminalDevice {
  return platform === 'win32' ? WINDOWS_CONSOLE : POSIX_TTY;
}

/**
 * Read one line from a stream, or null when the deadline passes first or the
 * stream ends. The stream is left for the caller to dispose of.
 */
export function readLineWithTimeout(input: Readable, timeoutMs: number): Promise<string | null> {
  return new Promise((resolve) => {
    const rl = createInterface({ input, terminal: false });
    let settled = false;

    const finish = (answer: string | null): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      rl.close();
      resolve(answer);
    };

    const timer = setTimeout(() => finish(null), timeoutMs);
    rl.once('line', (line: string) => finish(line));
    rl.once('close', () => finish(null));
    input.once('error', () => finish(null));
  });
}

export class TerminalLineReader implements BoundedLineReader {
  constructor(private readonly device: TerminalDevice) {}

  async readLine(message: string, timeoutMs: number): Promise<string | null> {
    if (!this.write(message)) {
      return null;
    }

    let fd: number;
    try {
      fd = openSync(this.device.inputPath, 'r');
    } catch {
      return null;
    }

    const input: Readable = isatty(fd) ? new ReadStream(fd) : createReadStream('', { fd });
    try {
      return await readLineWithTimeout(input, timeoutMs);
    } finally {
      input.destroy();
    }
  }

  private write(message: string): boolean {
    try {
      const fd = openSync(this.device.outputPath, 'w');
      try {
        writeSync(fd, message);
      } finally {
        closeSync(fd);
      }
      return true;
    } catch {
      return false;
    }
  }
}

/** Only "y" (any case, surrounding whitespace ignored) confirms */
export function isAffirmative(answer: string | null): boolean {
  return answer?.trim().toLowerCase() === 'y';
}

export class TerminalPrompt implements ConfirmationPrompt {
  constructor(
    private readonly reader: BoundedLineReader,
    private readonly timeoutMs: number = PROMPT_TIMEOUT_MS,
  ) {}

  async confirm(message: string): Promise<boolean> {
    return isAffirmative(await this.reader.readLine(message, this.timeoutMs));
  }
}

export function createTerminalPrompt(
  platform: NodeJS.Platform = process.platform,
  timeoutMs: number = PROMPT_TIMEOUT_MS,
): ConfirmationPrompt {
  return new TerminalPrompt(new TerminalLineReader(selectTerminalDevice(platform)), timeoutMs);
}
