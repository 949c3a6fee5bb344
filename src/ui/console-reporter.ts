import type { Reporter } from '../core/reporter.js';
import { debug, info, warn } from './output.js';

export interface ConsoleReporterOptions {
  /** Show debug lines (git commands, their output, the merged INI). */
  verbose?: boolean;
}

export function createConsoleReporter(opts: ConsoleReporterOptions = {}): Reporter {
  return {
    debug: (message) => {
      if (opts.verbose) debug(message);
    },
    info,
    warn,
  };
}
