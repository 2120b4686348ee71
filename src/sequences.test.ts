import { describe, expect, it } from 'vitest';
import {
  buildResetSequence,
  CLEAR_SCREEN,
  COMPLETION_MESSAGE,
  HOME_CURSOR,
  RESET_SEQUENCES,
  SHOW_CURSOR,
} from './sequences.js';

describe('sequences', () => {
  describe('RESET_SEQUENCES', () => {
    it('should contain eleven sequences', () => {
      expect(RESET_SEQUENCES).toHaveLength(11);
    });

    it('should list sequences in emission order', () => {
      expect(RESET_SEQUENCES.map((sequence) => sequence.name)).toEqual([
        'disable-mouse-tracking',
        'disable-mouse-button-tracking',
        'disable-mouse-any-event-tracking',
        'disable-mouse-sgr-mode',
        'disable-mouse-urxvt-mode',
        'show-cursor',
        'reset-colors',
        'disable-alt-screen',
        'clear-scrollback',
        'clear-screen',
        'home-cursor',
      ]);
    });

    it('should start every code with ESC [', () => {
      for (const sequence of RESET_SEQUENCES) {
        expect(sequence.code.charCodeAt(0)).toBe(0x1b);
        expect(sequence.code[1]).toBe('[');
      }
    });

    it('should only use set-to-value directives', () => {
      // Private modes are all reset (l) except the cursor, which is set visible (h)
      const privateModes = RESET_SEQUENCES.filter((sequence) => sequence.code.startsWith('\x1b[?'));
      expect(privateModes.map((sequence) => sequence.code.slice(-1))).toEqual([
        'l',
        'l',
        'l',
        'l',
        'l',
        'h',
        'l',
      ]);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(RESET_SEQUENCES)).toBe(true);
    });
  });

  describe('buildResetSequence', () => {
    it('should concatenate the full table with no separators', () => {
      expect(buildResetSequence()).toBe(
        '\x1b[?1000l\x1b[?1002l\x1b[?1003l\x1b[?1006l\x1b[?1015l\x1b[?25h\x1b[0m\x1b[?1049l\x1b[3J\x1b[2J\x1b[H',
      );
    });

    it('should concatenate a custom selection in the given order', () => {
      const subset = RESET_SEQUENCES.filter((sequence) =>
        ['home-cursor', 'show-cursor', 'clear-screen'].includes(sequence.name),
      );

      expect(buildResetSequence(subset)).toBe(`${SHOW_CURSOR}${CLEAR_SCREEN}${HOME_CURSOR}`);
    });

    it('should return an empty string for no sequences', () => {
      expect(buildResetSequence([])).toBe('');
    });
  });

  describe('COMPLETION_MESSAGE', () => {
    it('should be the confirmation text', () => {
      expect(COMPLETION_MESSAGE).toBe('Terminal state reset complete');
    });
  });
});
