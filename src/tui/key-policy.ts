/**
 * Decides whether a decoded character belongs in the search term.
 * Control characters without a binding (ctrl-a, ESC on its own, ...) are
 * dropped instead of being typed into the query.
 */
export function isSearchInput(char: string): boolean {
  if (char.length === 0) return false;
  const code = char.codePointAt(0) ?? 0;
  if (code < 0x20) return false;
  if (code >= 0x7f && code <= 0x9f) return false;
  return true;
}
