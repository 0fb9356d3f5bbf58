import { CliUsageError } from './errors.js';

/**
 * Removes every occurrence of the given value flags from `args` and returns
 * the last value seen (later flags win, like most CLIs).
 */
export function takeValueFlag(args: string[], names: readonly string[]): string | undefined {
  let found: string | undefined;
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !names.includes(token)) {
      index += 1;
      continue;
    }
    const value = args[index + 1];
    if (value === undefined) {
      throw new CliUsageError(`Flag '${token}' requires a value.`);
    }
    found = value;
    args.splice(index, 2);
  }
  return found;
}

export function takeSwitch(args: string[], names: readonly string[]): boolean {
  let seen = false;
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !names.includes(token)) {
      index += 1;
      continue;
    }
    seen = true;
    args.splice(index, 1);
  }
  return seen;
}

export function assertNoExtraArgs(args: readonly string[]): void {
  const [first] = args;
  if (first === undefined) return;
  const kind = first.startsWith('-') ? 'option' : 'argument';
  throw new CliUsageError(`Unknown ${kind} '${first}'.`);
}
