import type { FilterMode } from '../query/filters.js';
import type { Key } from './keys.js';
import { getBodyHeight } from './layout.js';
import { applyKey, buildFooter, createPickerState, refreshView } from './picker-state.js';
import { buildFrame, HEADER_TEXT, type FrameRow } from './viewport.js';

export type PickerResult = { kind: 'selected'; line: string } | { kind: 'cancelled' };

/** Everything the loop needs from the outside world. */
export interface PickerIo {
  size(): { width: number; height: number };
  draw(rows: readonly FrameRow[]): void;
  nextKey(): Promise<Key>;
}

export interface RunPickerOptions {
  mode?: FilterMode;
  header?: string;
}

/**
 * Runs the interactive loop until the operator confirms or cancels.
 * One frame is drawn per key; nothing is drawn after the final key.
 */
export async function runPicker(
  lines: readonly string[],
  io: PickerIo,
  options: RunPickerOptions = {}
): Promise<PickerResult> {
  const header = options.header ?? HEADER_TEXT;
  let state = createPickerState(lines, options.mode);

  for (;;) {
    const { width, height } = io.size();
    state = refreshView(state);
    const footer = buildFooter(state);
    io.draw(buildFrame({ lines: state.view, width, height, focus: state.focus, header, footer }));

    const key = await io.nextKey();
    const transition = applyKey(state, key, { pageSize: getBodyHeight(height) });
    switch (transition.kind) {
      case 'continue':
        state = transition.state;
        break;
      case 'selected':
        return { kind: 'selected', line: transition.line };
      case 'cancelled':
        return { kind: 'cancelled' };
    }
  }
}
