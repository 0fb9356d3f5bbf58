import { describe, expect, it } from 'vitest';
import type { Key } from '../../src/tui/keys.js';
import {
  applyKey,
  buildFooter,
  createPickerState,
  IDLE_HINT,
  isViewStale,
  refreshView,
  type PickerState,
  type Transition,
} from '../../src/tui/picker-state.js';

const FRUIT = ['apple', 'banana', 'grape'];
const CONTEXT = { pageSize: 10 };

const char = (c: string): Key => ({ kind: 'char', char: c });

function step(state: PickerState, key: Key): PickerState {
  const transition = applyKey(refreshView(state), key, CONTEXT);
  if (transition.kind !== 'continue') throw new Error(`unexpected ${transition.kind}`);
  return refreshView(transition.state);
}

function run(lines: string[], keys: Key[]): PickerState {
  return keys.reduce(step, refreshView(createPickerState(lines)));
}

function expectFocusInRange(state: PickerState): void {
  expect(state.focus).toBeGreaterThanOrEqual(0);
  expect(state.focus).toBeLessThanOrEqual(Math.max(0, state.view.length - 1));
}

describe('createPickerState', () => {
  it('starts unfiltered in fuzzy mode with focus on the first line', () => {
    const state = createPickerState(FRUIT);
    expect(state).toMatchObject({ term: '', mode: 'fuzzy', focus: 0, patternError: null });
    expect(isViewStale(state)).toBe(true);
    expect(refreshView(state).view).toEqual(FRUIT);
  });

  it('accepts a starting mode', () => {
    expect(createPickerState(FRUIT, 'regex').mode).toBe('regex');
  });
});

describe('refreshView', () => {
  it('returns the same state object when nothing changed', () => {
    const fresh = refreshView(createPickerState(FRUIT));
    expect(refreshView(fresh)).toBe(fresh);
  });

  it('filters by the current term', () => {
    expect(run(FRUIT, [char('a'), char('p')]).view).toEqual(['apple', 'grape']);
  });

  it('clamps the focus when the view shrinks below it', () => {
    const state = run(FRUIT, [{ kind: 'down' }, { kind: 'down' }, char('a'), char('p')]);
    expect(state.view).toEqual(['apple', 'grape']);
    expect(state.focus).toBe(1);
  });

  it('clamps to zero when nothing matches', () => {
    const state = run(FRUIT, [{ kind: 'down' }, char('z')]);
    expect(state.view).toEqual([]);
    expect(state.focus).toBe(0);
  });

  it('clamps a focus equal to the new view length', () => {
    // focus 2, view shrinks to two lines: index 2 is out of range
    const state = run(['ax', 'bx', 'cx', 'dy'], [{ kind: 'down' }, { kind: 'down' }, char('a')]);
    expect(state.view).toEqual(['ax']);
    expect(state.focus).toBe(0);

    const two = run(['ax', 'ay', 'bz'], [{ kind: 'down' }, { kind: 'down' }, char('a')]);
    expect(two.view).toEqual(['ax', 'ay']);
    expect(two.focus).toBe(1);
  });

  it('recomputes after a mode toggle', () => {
    const fuzzy = run(FRUIT, [char('^'), char('b')]);
    expect(fuzzy.view).toEqual([]);
    const regex = step(fuzzy, { kind: 'toggleMode' });
    expect(regex.mode).toBe('regex');
    expect(regex.view).toEqual(['banana']);
  });

  it('keeps the last valid view while the regex does not compile', () => {
    const before = run(FRUIT, [{ kind: 'toggleMode' }, char('a'), char('p')]);
    expect(before.view).toEqual(['apple', 'grape']);

    const broken = step(before, char('('));
    expect(broken.view).toEqual(['apple', 'grape']);
    expect(broken.patternError).not.toBeNull();
    expect(isViewStale(broken)).toBe(false);

    const recovered = step(broken, { kind: 'backspace' });
    expect(recovered.patternError).toBeNull();
    expect(recovered.view).toEqual(['apple', 'grape']);
  });
});

describe('applyKey', () => {
  it('stops at the last line when moving down', () => {
    const state = run(FRUIT, [char('a'), char('p'), { kind: 'down' }, { kind: 'down' }]);
    expect(state.view).toEqual(['apple', 'grape']);
    expect(state.focus).toBe(1);
  });

  it('stops at the first line when moving up', () => {
    expect(run(FRUIT, [{ kind: 'up' }, { kind: 'up' }]).focus).toBe(0);
    expect(run(FRUIT, [{ kind: 'down' }, { kind: 'down' }, { kind: 'up' }]).focus).toBe(1);
  });

  it('moves a page at a time on screen-down', () => {
    const lines = Array.from({ length: 25 }, (_, i) => `line ${i}`);
    const state = refreshView(createPickerState(lines));
    const once = applyKey(state, { kind: 'screenDown' }, { pageSize: 10 });
    expect(once.kind === 'continue' && once.state.focus).toBe(10);
    const far = applyKey({ ...state, focus: 20 }, { kind: 'screenDown' }, { pageSize: 10 });
    expect(far.kind === 'continue' && far.state.focus).toBe(24);
  });

  it('selects the focused line on enter', () => {
    const state = run(FRUIT, [char('a'), char('p'), { kind: 'down' }]);
    expect(applyKey(state, { kind: 'enter' }, CONTEXT)).toEqual<Transition>({ kind: 'selected', line: 'grape' });
  });

  it('ignores enter when nothing matches', () => {
    const state = run(FRUIT, [char('q')]);
    const transition = applyKey(state, { kind: 'enter' }, CONTEXT);
    expect(transition).toEqual({ kind: 'continue', state });
  });

  it('cancels from any state', () => {
    expect(applyKey(run(FRUIT, [char('x'), { kind: 'down' }]), { kind: 'cancel' }, CONTEXT)).toEqual({
      kind: 'cancelled',
    });
  });

  it('removes the last character on backspace', () => {
    expect(run(FRUIT, [char('a'), char('p'), { kind: 'backspace' }]).term).toBe('a');
    expect(run(FRUIT, [char('a'), char('🍎'), { kind: 'backspace' }]).term).toBe('a');
  });

  it('treats backspace on an empty term as a no-op', () => {
    const state = refreshView(createPickerState(FRUIT));
    expect(applyKey(state, { kind: 'backspace' }, CONTEXT)).toEqual({ kind: 'continue', state });
  });

  it('ignores none and control characters', () => {
    const state = refreshView(createPickerState(FRUIT));
    expect(applyKey(state, { kind: 'none' }, CONTEXT)).toEqual({ kind: 'continue', state });
    expect(applyKey(state, char('\x01'), CONTEXT)).toEqual({ kind: 'continue', state });
  });

  it('keeps the focus in range across a long key sequence', () => {
    const lines = ['alpha', 'beta', 'gamma', 'delta', 'epsilon'];
    const keys: Key[] = [
      { kind: 'down' },
      { kind: 'down' },
      { kind: 'down' },
      { kind: 'down' },
      char('e'),
      { kind: 'down' },
      char('t'),
      { kind: 'toggleMode' },
      char('('),
      { kind: 'backspace' },
      { kind: 'backspace' },
      { kind: 'screenDown' },
      char('z'),
      { kind: 'up' },
      { kind: 'backspace' },
      { kind: 'down' },
    ];
    let state = refreshView(createPickerState(lines));
    for (const key of keys) {
      state = step(state, key);
      expectFocusInRange(state);
    }
  });
});

describe('buildFooter', () => {
  it('shows the idle hint for an empty term', () => {
    expect(buildFooter(refreshView(createPickerState(FRUIT)))).toBe(IDLE_HINT);
  });

  it('shows mode and term while searching', () => {
    expect(buildFooter(run(FRUIT, [char('a'), char('p')]))).toBe('(fuzzy) Searching for: ap');
    expect(buildFooter(run(FRUIT, [{ kind: 'toggleMode' }, char('^')]))).toBe('(regex) Searching for: ^');
  });

  it('flags an invalid pattern', () => {
    expect(buildFooter(run(FRUIT, [{ kind: 'toggleMode' }, char('[')]))).toBe(
      '(regex) Searching for: [ [invalid pattern]'
    );
  });
});
