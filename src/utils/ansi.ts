/**
 * Centralized ANSI escape code constants and helpers.
 *
 * SGR and OSC-8 framing used by styles, plus the terminal control sequences
 * emitted for control segments.
 */

// --- SGR framing ---

export const ESC = '\x1b';
export const ANSI_RESET = '\x1b[0m';

/** Build an SGR sequence from its parameter list, e.g. `1;31` → `\x1b[1;31m`. */
export function sgr(codes: string): string {
  return `\x1b[${codes}m`;
}

/** OSC-8 hyperlink opener. */
export function linkStart(url: string): string {
  return `\x1b]8;;${url}\x1b\\`;
}

/** OSC-8 hyperlink terminator. */
export const LINK_END = '\x1b]8;;\x1b\\';

// --- Control sequences ---

export const BELL = '\x07';
export const CARRIAGE_RETURN = '\r';
export const CURSOR_HOME = '\x1b[H';
export const CLEAR_SCREEN = '\x1b[2J';
export const SHOW_CURSOR = '\x1b[?25h';
export const HIDE_CURSOR = '\x1b[?25l';
export const ENABLE_ALT_SCREEN = '\x1b[?1049h';
export const DISABLE_ALT_SCREEN = '\x1b[?1049l';

export function cursorUp(n: number): string {
  return `\x1b[${n}A`;
}

export function cursorDown(n: number): string {
  return `\x1b[${n}B`;
}

export function cursorForward(n: number): string {
  return `\x1b[${n}C`;
}

export function cursorBackward(n: number): string {
  return `\x1b[${n}D`;
}

/** Move to a zero-based column. */
export function cursorToColumn(x: number): string {
  return `\x1b[${x + 1}G`;
}

/** Move to a zero-based (x, y) position. */
export function cursorTo(x: number, y: number): string {
  return `\x1b[${y + 1};${x + 1}H`;
}

/** 0 = to end of line, 1 = to start, 2 = whole line. */
export function eraseInLine(mode: number): string {
  return `\x1b[${mode}K`;
}

export function windowTitle(title: string): string {
  return `\x1b]0;${title}\x07`;
}

// --- Parsing/stripping ---

/**
 * Matches CSI sequences (SGR and cursor movement) and OSC sequences terminated
 * by BEL or ST, e.g. \x1b[1;34m, \x1b[2J, \x1b]8;;url\x1b\\.
 */
export const ANSI_PATTERN = /\x1b\[[0-?]*[ -/]*[@-~]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g;

/** Remove every escape sequence matched by `ANSI_PATTERN`. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}
