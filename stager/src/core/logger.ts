/**
 * Console status banners for pipeline steps.
 */
import type { Command } from './command.js';
import { formatCommand } from './command.js';

const BLUE = '\u001b[34m';
const GREEN = '\u001b[32m';
const RED = '\u001b[31m';
const RESET = '\u001b[0m';

const BANNER_WIDTH = 40;

export interface LoggerOptions {
  color?: boolean;
  quiet?: boolean;
}

export interface Logger {
  started(step: string): void;
  finished(step: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  command(command: Command): void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { color = false, quiet = false } = options;

  const paint = (code: string, text: string) =>
    color ? `${code}${text}${RESET}` : text;

  // Padding is applied after colouring, like printf "%40s" in the old banners
  const banner = (code: string, text: string) =>
    `\t${paint(code, text).padStart(BANNER_WIDTH)}`;

  return {
    started(step) {
      if (quiet) return;
      console.log(`\n${banner(BLUE, `${step} STARTED `)}`);
    },
    finished(step) {
      if (quiet) return;
      console.log(banner(GREEN, `${step} FINISHED OKAY `));
    },
    info(message) {
      if (quiet) return;
      console.log(banner(BLUE, ` INFO: ${message} `));
    },
    warn(message) {
      if (quiet) return;
      console.error(banner(RED, ` WARNING: ${message} `));
    },
    error(message) {
      console.error(banner(RED, ` ERROR: ${message} `));
    },
    command(command) {
      if (quiet) return;
      console.log(`  Running: ${formatCommand(command)}`);
    },
  };
}

export const silentLogger: Logger = createLogger({ quiet: true });
