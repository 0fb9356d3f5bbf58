export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class TerminalUnavailableError extends Error {
  constructor(
    public readonly devicePath: string,
    reason: string
  ) {
    super(`Cannot use terminal ${devicePath}: ${reason}`);
    this.name = 'TerminalUnavailableError';
  }
}

export class TerminalClosedError extends Error {
  constructor() {
    super('Terminal input closed before a selection was made');
    this.name = 'TerminalClosedError';
  }
}
