// Library entry: use these from a Node application instead of shelling out to the CLI

export { type OutputStream, resetTerminal } from './reset.js';
export {
  buildResetSequence,
  COMPLETION_MESSAGE,
  RESET_SEQUENCES,
  type ResetSequence,
} from './sequences.js';
export { cleanupTerminal, exitTerminal, type TerminalStreams } from './terminal-cleanup.js';
