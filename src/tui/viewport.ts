import terminalKit from 'terminal-kit';
import { getBodyHeight, getScrollOffset } from './layout.js';

export type RowStyle = 'frame' | 'highlight' | 'plain';

export interface FrameRow {
  text: string;
  style: RowStyle;
}

export interface FrameInput {
  lines: readonly string[];
  width: number;
  height: number;
  focus: number;
  header: string;
  footer: string;
}

export const HEADER_TEXT = 'Navigate with ↑ and ↓, `return` prints the selected line, ctrl-c quits';

/**
 * Truncates to `width` terminal columns, then pads with spaces so the cell
 * fully overwrites whatever an earlier, wider frame left behind.
 */
export function fitToWidth(text: string, width: number): string {
  if (width <= 0) return '';
  const shown = terminalKit.stringWidth(text) <= width ? text : terminalKit.truncateString(text, width);
  const pad = Math.max(0, width - terminalKit.stringWidth(shown));
  return pad > 0 ? `${shown}${' '.repeat(pad)}` : shown;
}

/** Tabs and C0/C1 control characters would move the terminal cursor; show them inert. */
export function toCellText(line: string): string {
  return line.replace(/\t/g, '    ').replace(/[\u0000-\u001f\u007f-\u009f]/g, '?');
}

export function buildFrame(input: FrameInput): FrameRow[] {
  const { lines, width, height, focus } = input;
  if (height <= 0) return [];

  const rows: FrameRow[] = [{ text: fitToWidth(input.header, width), style: 'frame' }];

  const bodyHeight = getBodyHeight(height);
  const lower = getScrollOffset(lines.length, focus, height);
  for (let lineNo = lower; lineNo < lower + bodyHeight; lineNo++) {
    const line = lines[lineNo];
    if (line === undefined) {
      rows.push({ text: fitToWidth('', width), style: 'plain' });
      continue;
    }
    rows.push({ text: fitToWidth(toCellText(line), width), style: lineNo === focus ? 'highlight' : 'plain' });
  }

  if (height > 1) {
    rows.push({ text: fitToWidth(input.footer, width), style: 'frame' });
  }
  return rows;
}
