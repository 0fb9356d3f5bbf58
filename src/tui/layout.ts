export const HEADER_HEIGHT = 1;
export const FOOTER_HEIGHT = 1;

/** Rows left for the list between the header and the footer. */
export function getBodyHeight(terminalHeight: number): number {
  return Math.max(0, terminalHeight - HEADER_HEIGHT - FOOTER_HEIGHT);
}

/**
 * First list index shown in the body. Follows the focused line, but once
 * the focus gets close enough to the end the window pins to the last page.
 */
export function getScrollOffset(listLength: number, focus: number, terminalHeight: number): number {
  const bodyHeight = getBodyHeight(terminalHeight);
  if (focus + bodyHeight > listLength) {
    return Math.max(0, listLength - bodyHeight);
  }
  return focus;
}
