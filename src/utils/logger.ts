export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Print debug messages (default: false) */
  verbose?: boolean;
}

/**
 * Logger that writes to the process console.
 * Warnings and errors go to stderr so `--json` output on stdout stays parseable.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  log(message: string): void {
    console.log(message);
  }

  info(message: string): void {
    console.info(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(message);
    }
  }
}

export class SilentLogger implements Logger {
  log(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  debug(): void {}
}
