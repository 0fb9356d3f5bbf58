import { applyFilter, nextFilterMode, type FilterMode } from '../query/filters.js';
import { isSearchInput } from './key-policy.js';
import type { Key } from './keys.js';

export interface PickerState {
  readonly lines: readonly string[];
  readonly term: string;
  readonly mode: FilterMode;
  readonly focus: number;
  /** Lines currently shown; valid for `computedFor` only. */
  readonly view: readonly string[];
  readonly computedFor: { term: string; mode: FilterMode } | null;
  /** Compiler message while the regex term does not compile. */
  readonly patternError: string | null;
}

export type Transition =
  | { kind: 'continue'; state: PickerState }
  | { kind: 'selected'; line: string }
  | { kind: 'cancelled' };

export interface TransitionContext {
  /** Body rows on screen; screen-down moves the focus by this much. */
  pageSize: number;
}

export const IDLE_HINT = 'Start typing to search, ctrl-t switches search mode';

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max);
}

export function createPickerState(lines: readonly string[], mode: FilterMode = 'fuzzy'): PickerState {
  return {
    lines,
    term: '',
    mode,
    focus: 0,
    view: lines,
    computedFor: null,
    patternError: null,
  };
}

export function isViewStale(state: PickerState): boolean {
  const computed = state.computedFor;
  return computed === null || computed.term !== state.term || computed.mode !== state.mode;
}

/**
 * Brings `view` in line with the current term and mode, clamping the focus
 * into the new view. A regex that does not compile keeps the previous view
 * and records the error instead.
 */
export function refreshView(state: PickerState): PickerState {
  if (!isViewStale(state)) return state;

  const computedFor = { term: state.term, mode: state.mode };
  const outcome = applyFilter(state.mode, state.lines, state.term);
  const view = outcome.kind === 'ok' ? outcome.lines : state.view;
  const patternError = outcome.kind === 'ok' ? null : outcome.message;
  const focus = state.focus >= view.length ? Math.max(0, view.length - 1) : state.focus;

  return { ...state, view, focus, computedFor, patternError };
}

export function buildFooter(state: PickerState): string {
  if (!state.term) return IDLE_HINT;
  const base = `(${state.mode}) Searching for: ${state.term}`;
  return state.patternError ? `${base} [invalid pattern]` : base;
}

function moveFocus(state: PickerState, delta: number): PickerState {
  const last = Math.max(0, state.view.length - 1);
  return { ...state, focus: clamp(state.focus + delta, 0, last) };
}

/**
 * The picker's state machine. Term and mode edits leave the view stale;
 * `refreshView` recomputes it before the next render.
 */
export function applyKey(state: PickerState, key: Key, context: TransitionContext): Transition {
  switch (key.kind) {
    case 'up':
      return { kind: 'continue', state: moveFocus(state, -1) };
    case 'down':
      return { kind: 'continue', state: moveFocus(state, 1) };
    case 'screenDown':
      return { kind: 'continue', state: moveFocus(state, Math.max(1, context.pageSize)) };
    case 'enter': {
      const line = state.view[state.focus];
      if (line === undefined) return { kind: 'continue', state };
      return { kind: 'selected', line };
    }
    case 'backspace': {
      if (!state.term) return { kind: 'continue', state };
      const chars = Array.from(state.term);
      chars.pop();
      return { kind: 'continue', state: { ...state, term: chars.join('') } };
    }
    case 'cancel':
      return { kind: 'cancelled' };
    case 'toggleMode':
      return { kind: 'continue', state: { ...state, mode: nextFilterMode(state.mode) } };
    case 'char':
      if (!isSearchInput(key.char)) return { kind: 'continue', state };
      return { kind: 'continue', state: { ...state, term: state.term + key.char } };
    case 'none':
      return { kind: 'continue', state };
  }
}
