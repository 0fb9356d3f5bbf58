/**
 * pickline - read lines from stdin, pick one full-screen, print it
 */

import type { Readable } from 'node:stream';
import { parsePickerOptions, type PickerOptions } from '../config/options.js';
import { StreamByteReader } from '../tui/byte-reader.js';
import { nextKey } from '../tui/keys.js';
import { createTermSurface, paintFrame } from '../tui/painter.js';
import { runPicker, type PickerIo, type PickerResult } from '../tui/picker.js';
import { openTerminalSession, type TerminalSession } from '../tui/session.js';
import { CliUsageError } from './errors.js';
import { assertNoExtraArgs, takeSwitch, takeValueFlag } from './flag-utils.js';
import { readLines } from './read-lines.js';

/** An interactive terminal the picker can run on, plus its teardown. */
export interface PickerTerminal {
  io: PickerIo;
  close(): Promise<void>;
}

export interface PickDeps {
  input: Readable;
  inputIsTty: boolean;
  openTerminal: (options: PickerOptions) => PickerTerminal;
  writeResult: (line: string) => void;
}

export function parsePickArgs(args: string[]): PickerOptions {
  const rest = [...args];
  const mode = takeValueFlag(rest, ['--mode', '-m']);
  const noColor = takeSwitch(rest, ['--no-color']);
  assertNoExtraArgs(rest);
  return parsePickerOptions({ mode, colors: !noColor });
}

/**
 * Binds the picker loop to a terminal session. Write failures on the device
 * fail the pending key read, so they surface inside the loop and the
 * session is still closed by `runPick`.
 */
export function createPickerTerminal(session: TerminalSession, options: PickerOptions): PickerTerminal {
  const reader = new StreamByteReader(session.input);
  const surface = createTermSurface(session.term, session.output, { colors: options.colors });
  session.output.on('error', (error: Error) => reader.abort(error));

  return {
    io: {
      size: () => session.size(),
      draw: (rows) => paintFrame(surface, rows),
      nextKey: () => nextKey(reader),
    },
    close: async () => {
      reader.dispose();
      await session.close();
    },
  };
}

export function openPickerTerminal(options: PickerOptions): PickerTerminal {
  return createPickerTerminal(openTerminalSession(), options);
}

export async function runPick(options: PickerOptions, deps: PickDeps): Promise<PickerResult> {
  if (deps.inputIsTty) {
    throw new CliUsageError('No input. Pipe lines into pickline, e.g. `ls | pickline`.');
  }

  const lines = await readLines(deps.input);
  if (lines.length === 0) return { kind: 'cancelled' };

  const terminal = deps.openTerminal(options);
  let result: PickerResult;
  try {
    result = await runPicker(lines, terminal.io, { mode: options.mode });
  } finally {
    await terminal.close();
  }

  if (result.kind === 'selected') {
    deps.writeResult(result.line);
  }
  return result;
}

export async function handlePickCommand(args: string[]): Promise<void> {
  const options = parsePickArgs(args);
  await runPick(options, {
    input: process.stdin,
    inputIsTty: Boolean(process.stdin.isTTY),
    openTerminal: openPickerTerminal,
    writeResult: (line) => console.log(line),
  });
}
