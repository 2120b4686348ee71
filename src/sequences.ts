/**
 * ANSI/VT100 sequences that put a terminal back into a usable state
 * after a full-screen application exits without cleaning up.
 */

export interface ResetSequence {
  name: string;
  code: string;
  description: string;
}

// ============================================================================
// Mouse Reporting
// ============================================================================

export const DISABLE_MOUSE_TRACKING = '\x1b[?1000l';
export const DISABLE_MOUSE_BUTTON_TRACKING = '\x1b[?1002l';
export const DISABLE_MOUSE_ANY_EVENT_TRACKING = '\x1b[?1003l';
export const DISABLE_MOUSE_SGR_MODE = '\x1b[?1006l';
export const DISABLE_MOUSE_URXVT_MODE = '\x1b[?1015l';

// ============================================================================
// Cursor, Styles & Screen
// ============================================================================

export const SHOW_CURSOR = '\x1b[?25h';
export const RESET_COLORS = '\x1b[0m';
export const DISABLE_ALT_SCREEN = '\x1b[?1049l';
export const CLEAR_SCROLLBACK = '\x1b[3J';
export const CLEAR_SCREEN = '\x1b[2J';
export const HOME_CURSOR = '\x1b[H';

/** Line printed after the sequences */
export const COMPLETION_MESSAGE = 'Terminal state reset complete';

/**
 * Reset sequences in emission order.
 *
 * The codes are independent of each other, but the order is fixed so the
 * output stays byte-identical between releases.
 */
export const RESET_SEQUENCES: readonly ResetSequence[] = Object.freeze([
  {
    name: 'disable-mouse-tracking',
    code: DISABLE_MOUSE_TRACKING,
    description: 'Turn off X10/normal mouse reporting (mode 1000)',
  },
  {
    name: 'disable-mouse-button-tracking',
    code: DISABLE_MOUSE_BUTTON_TRACKING,
    description: 'Turn off button-motion mouse reporting (mode 1002)',
  },
  {
    name: 'disable-mouse-any-event-tracking',
    code: DISABLE_MOUSE_ANY_EVENT_TRACKING,
    description: 'Turn off all-motion mouse reporting (mode 1003)',
  },
  {
    name: 'disable-mouse-sgr-mode',
    code: DISABLE_MOUSE_SGR_MODE,
    description: 'Turn off SGR-encoded mouse coordinates (mode 1006)',
  },
  {
    name: 'disable-mouse-urxvt-mode',
    code: DISABLE_MOUSE_URXVT_MODE,
    description: 'Turn off URXVT-encoded mouse coordinates (mode 1015)',
  },
  {
    name: 'show-cursor',
    code: SHOW_CURSOR,
    description: 'Make the text cursor visible',
  },
  {
    name: 'reset-colors',
    code: RESET_COLORS,
    description: 'Clear foreground/background colors and text styles',
  },
  {
    name: 'disable-alt-screen',
    code: DISABLE_ALT_SCREEN,
    description: 'Switch back to the primary screen buffer (mode 1049)',
  },
  {
    name: 'clear-scrollback',
    code: CLEAR_SCROLLBACK,
    description: 'Erase saved scrollback history',
  },
  {
    name: 'clear-screen',
    code: CLEAR_SCREEN,
    description: 'Erase all visible screen content',
  },
  {
    name: 'home-cursor',
    code: HOME_CURSOR,
    description: 'Move the cursor to row 1, column 1',
  },
]);

/**
 * Concatenate the codes of the given sequences, in order, with no separators
 */
export function buildResetSequence(sequences: readonly ResetSequence[] = RESET_SEQUENCES): string {
  return sequences.map((sequence) => sequence.code).join('');
}
