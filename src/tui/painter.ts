import type { Writable } from 'node:stream';
import terminalKit from 'terminal-kit';
import type { FrameRow, RowStyle } from './viewport.js';

export type Term = ReturnType<typeof terminalKit.createTerminal>;

/** The drawing operations a frame needs. Coordinates are 1-based. */
export interface FrameSurface {
  begin(): void;
  moveTo(x: number, y: number): void;
  write(text: string, style: RowStyle): void;
  commit(): void;
}

export function paintFrame(surface: FrameSurface, rows: readonly FrameRow[]): void {
  surface.begin();
  rows.forEach((row, index) => {
    surface.moveTo(1, index + 1);
    surface.write(row.text, row.style);
  });
  surface.commit();
}

/**
 * Draws through terminal-kit onto `output`. Writes are corked for the
 * length of a frame so the terminal receives it in one flush.
 */
export function createTermSurface(term: Term, output: Writable, options: { colors: boolean }): FrameSurface {
  const writeStyled = (text: string, style: RowStyle): void => {
    switch (style) {
      case 'plain':
        term.noFormat(text);
        return;
      case 'frame':
        if (options.colors) term.bgBlue.white.noFormat(text);
        else term.noFormat(text);
        return;
      case 'highlight':
        if (options.colors) term.bgWhite.blue.noFormat(text);
        else term.inverse.noFormat(text);
        return;
    }
  };

  return {
    begin: () => output.cork(),
    moveTo: (x, y) => {
      term.moveTo(x, y);
    },
    write: (text, style) => {
      writeStyled(text, style);
      term.styleReset();
    },
    commit: () => output.uncork(),
  };
}
