/**
 * Line filtering for the picker.
 *
 * Both strategies are case-insensitive and keep the input order.
 */

export const FILTER_MODES = ['fuzzy', 'regex'] as const;

export type FilterMode = (typeof FILTER_MODES)[number];

export type LineFilter = (line: string) => boolean;

export type FilterOutcome =
  | { kind: 'ok'; lines: readonly string[] }
  | { kind: 'invalid'; message: string };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds the fuzzy pattern for a search term: every character, escaped,
 * with a greedy gap of anything but a newline between neighbours. `.` is
 * not used for the gap since it also stops at `\r`, U+2028 and U+2029.
 */
export function buildFuzzyPattern(term: string): RegExp {
  const source = Array.from(term).map(escapeRegExp).join('[^\\n]*');
  return new RegExp(source, 'i');
}

/**
 * Matches lines that contain the term's characters as an ordered
 * subsequence. The empty term matches everything.
 */
export function filterByFuzzy(term: string): LineFilter {
  if (!term) return () => true;
  const pattern = buildFuzzyPattern(term);
  return (line) => pattern.test(line);
}

/**
 * Compiles `term` as a regular expression. Throws the engine's SyntaxError
 * for invalid patterns; use `applyFilter` for the non-throwing variant.
 */
export function filterByRegex(term: string): LineFilter {
  const pattern = new RegExp(term, 'i');
  return (line) => pattern.test(line);
}

export function nextFilterMode(mode: FilterMode): FilterMode {
  const index = FILTER_MODES.indexOf(mode);
  return FILTER_MODES[(index + 1) % FILTER_MODES.length] ?? FILTER_MODES[0];
}

function buildFilter(mode: FilterMode, term: string): LineFilter {
  switch (mode) {
    case 'fuzzy':
      return filterByFuzzy(term);
    case 'regex':
      return filterByRegex(term);
  }
}

export function applyFilter(mode: FilterMode, lines: readonly string[], term: string): FilterOutcome {
  let filter: LineFilter;
  try {
    filter = buildFilter(mode, term);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { kind: 'invalid', message: error.message };
    }
    throw error;
  }
  return { kind: 'ok', lines: lines.filter(filter) };
}
