import chalk from 'chalk';

export interface Logger {
  /** Phase headers. */
  step(message: string): void;
  info(message: string): void;
  detail(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
}

type Writer = (line: string) => void;

function colored(write: Writer, verbose: boolean): Logger {
  return {
    step: msg => write(chalk.blue(msg)),
    info: msg => write(msg),
    detail: msg => { if (verbose) write(chalk.dim(msg)); },
    warn: msg => write(chalk.yellow(`Warning: ${msg}`)),
    error: msg => write(chalk.red(msg)),
    success: msg => write(chalk.green(msg)),
  };
}

export function createConsoleLogger(verbose: boolean = false): Logger {
  return colored(line => console.log(line), verbose);
}

/** Writes to stderr only; stdout belongs to the MCP transport. */
export function createStderrLogger(verbose: boolean = false): Logger {
  return colored(line => console.error(line), verbose);
}

/**
 * Records every line (without colour codes) into `lines`, then forwards to
 * `inner` when given.
 */
export function createCaptureLogger(lines: string[], inner?: Logger): Logger {
  const record = (level: string, msg: string) => {
    lines.push(level ? `${level}: ${msg}` : msg);
  };
  return {
    step: msg => { record('', msg); inner?.step(msg); },
    info: msg => { record('', msg); inner?.info(msg); },
    detail: msg => { record('', msg); inner?.detail(msg); },
    warn: msg => { record('Warning', msg); inner?.warn(msg); },
    error: msg => { record('Error', msg); inner?.error(msg); },
    success: msg => { record('', msg); inner?.success(msg); },
  };
}

export const silentLogger: Logger = {
  step: () => {},
  info: () => {},
  detail: () => {},
  warn: () => {},
  error: () => {},
  success: () => {},
};
