import type { Logger } from '../utils/index.js';

/** Flags on the root `hix` program, shared by every subcommand */
export interface GlobalOptions {
  verbose: boolean;
  /** Machine-readable stdout; human text and warnings go quiet */
  json: boolean;
}

/**
 * Handed to each command action. Structurally a Logger, so commands can
 * pass it straight to providers, the pipeline and the index store.
 */
export interface CommandContext extends Required<Logger> {
  options: GlobalOptions;
  /** stdout, dropped under --json */
  log: (message: string) => void;
  error: (message: string) => void;
}

/** Commands build their context lazily so global flags are parsed first */
export type ContextFactory = () => CommandContext;
