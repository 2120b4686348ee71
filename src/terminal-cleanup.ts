/**
 * In-process terminal cleanup
 *
 * For terminal-kit based applications that want to restore the terminal
 * themselves on exit instead of running the term-reset command.
 */

import termKit from 'terminal-kit';
import type { OutputStream } from './reset.js';
import { buildResetSequence } from './sequences.js';

/**
 * The parts of stdin/stdout that cleanup touches
 */
export interface TerminalStreams {
  input: {
    isTTY?: boolean;
    setRawMode?: (mode: boolean) => unknown;
  };
  output: OutputStream & {
    isTTY?: boolean;
  };
}

function reportRestoreFailure(scope: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`[term-reset] restore ${scope} failed: ${message}\n`);
}

/**
 * Fully reset the terminal to a clean state.
 *
 * Handles:
 * - Releasing terminal-kit input grabbing (and the mouse reporting it enabled)
 * - Resetting raw mode
 * - Writing the reset sequences (mouse modes, cursor, styles, alternate screen, screen clear)
 *
 * Each step runs even if an earlier one failed. Failures are reported on
 * stderr; this function never throws.
 */
export function cleanupTerminal(
  streams: TerminalStreams = { input: process.stdin, output: process.stdout },
): void {
  const { input, output } = streams;

  try {
    termKit.terminal.grabInput(false);
  } catch (error) {
    reportRestoreFailure('input grab', error);
  }

  if (input.isTTY && input.setRawMode) {
    try {
      input.setRawMode(false);
    } catch (error) {
      reportRestoreFailure('raw mode', error);
    }
  }

  // Escape codes would corrupt piped output
  if (output.isTTY) {
    try {
      output.write(buildResetSequence());
    } catch (error) {
      reportRestoreFailure('screen', error);
    }
  }
}

/**
 * Full cleanup for app exit.
 */
export function exitTerminal(exitCode: number = 0): never {
  cleanupTerminal();
  process.exit(exitCode);
}
