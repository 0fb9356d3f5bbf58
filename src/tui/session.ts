import fs from 'node:fs';
import tty from 'node:tty';
import terminalKit from 'terminal-kit';
import { TerminalUnavailableError } from '../cli/errors.js';
import type { Term } from './painter.js';

export const DEFAULT_TTY_PATH = '/dev/tty';

export interface TerminalSession {
  readonly term: Term;
  readonly input: tty.ReadStream;
  readonly output: tty.WriteStream;
  /** Current terminal size, re-read on every call. */
  size(): { width: number; height: number };
  /** Restores the terminal. Safe to call more than once. */
  close(): Promise<void>;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function flush(output: tty.WriteStream): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write('', (error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

function openDevice(devicePath: string): { input: tty.ReadStream; output: tty.WriteStream } {
  let readFd: number | null = null;
  let writeFd: number | null = null;
  let input: tty.ReadStream | null = null;

  try {
    readFd = fs.openSync(devicePath, 'r');
    writeFd = fs.openSync(devicePath, 'w');
    if (!tty.isatty(readFd) || !tty.isatty(writeFd)) {
      throw new TerminalUnavailableError(devicePath, 'not a terminal');
    }
    input = new tty.ReadStream(readFd);
    return { input, output: new tty.WriteStream(writeFd) };
  } catch (error) {
    // A stream owns its descriptor once created.
    if (input) input.destroy();
    else if (readFd !== null) fs.closeSync(readFd);
    if (writeFd !== null) fs.closeSync(writeFd);
    if (error instanceof TerminalUnavailableError) throw error;
    throw new TerminalUnavailableError(devicePath, describe(error));
  }
}

/**
 * Puts already-open terminal streams into picker mode: raw input, hidden
 * cursor, then the alternate screen. On failure the streams are restored
 * and destroyed before `TerminalUnavailableError` is thrown.
 */
export function startTerminalSession(
  input: tty.ReadStream,
  output: tty.WriteStream,
  devicePath: string = DEFAULT_TTY_PATH
): TerminalSession {
  let rawMode = false;
  let term: Term;
  try {
    input.setRawMode(true);
    rawMode = true;
    term = terminalKit.createTerminal({
      stdin: input,
      stdout: output,
      isTTY: true,
      generic: 'xterm',
      appId: '',
      appName: 'pickline',
    });
    term.hideCursor();
    term.fullscreen(true);
  } catch (error) {
    if (rawMode) input.setRawMode(false);
    input.destroy();
    output.destroy();
    throw new TerminalUnavailableError(devicePath, describe(error));
  }

  let closed = false;

  return {
    term,
    input,
    output,
    size: () => ({
      width: output.columns || 80,
      height: output.rows || 24,
    }),
    close: async () => {
      if (closed) return;
      closed = true;
      try {
        term.styleReset();
        term.hideCursor(false);
        term.fullscreen(false);
        await flush(output);
      } finally {
        input.setRawMode(false);
        input.destroy();
        output.destroy();
      }
    },
  };
}

/**
 * Takes over the controlling terminal. The process's own stdin and stdout
 * are left alone, so piped input and the final result never touch the
 * device.
 *
 * Throws `TerminalUnavailableError` without leaving anything open or in raw
 * mode when the device cannot be used.
 */
export function openTerminalSession(devicePath: string = DEFAULT_TTY_PATH): TerminalSession {
  const { input, output } = openDevice(devicePath);
  return startTerminalSession(input, output, devicePath);
}
