export const supportsAnsiColor = Boolean(process.stderr.isTTY);

export function boldText(text: string): string {
  return `\u001b[1m${text}\u001b[22m`;
}

export function dimText(text: string): string {
  return `\u001b[2m${text}\u001b[22m`;
}
