import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('pickline')} ${dimText('— pick one line from stdin')}`
    : 'pickline — pick one line from stdin';

  const lines = [
    title,
    '',
    'Usage: <command> | pickline [options]',
    '',
    formatSection('Options', [
      ['--mode, -m <fuzzy|regex>', 'Search mode to start in (default: fuzzy)'],
      ['--no-color', 'Draw without colors'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Keys', [
      ['↑ / ctrl-p', 'Move up'],
      ['↓ / ctrl-n', 'Move down'],
      ['ctrl-d', 'Move down one screen'],
      ['return', 'Print the selected line and exit'],
      ['backspace', 'Delete the last search character'],
      ['ctrl-t', 'Switch between fuzzy and regex search'],
      ['ctrl-c', 'Exit without printing'],
    ]),
    '',
    dimText('The selected line is written to stdout; nothing is written on ctrl-c.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
