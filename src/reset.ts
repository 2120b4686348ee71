import { buildResetSequence, COMPLETION_MESSAGE } from './sequences.js';

/**
 * Anything the reset output can be written to (process.stdout, a socket, a test double)
 */
export interface OutputStream {
  write(chunk: string): boolean;
}

/**
 * Write the full reset block, then the confirmation line.
 *
 * The sequences go out in a single write so nothing else can land between
 * them. Write failures are left to the stream's own error handling.
 */
export function resetTerminal(output: OutputStream = process.stdout): void {
  output.write(buildResetSequence());
  output.write(`${COMPLETION_MESSAGE}\n`);
}
