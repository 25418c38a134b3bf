export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Writes diagnostics to stderr so that stdout carries only the report.
 * Progress messages (`log`) are dropped unless verbose.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly verbose = false) {}

  log(message: string): void {
    if (this.verbose) {
      console.error(message);
    }
  }

  warn(message: string): void {
    console.error(`warning: ${message}`);
  }

  error(message: string): void {
    console.error(`error: ${message}`);
  }
}

export class SilentLogger implements Logger {
  log(): void {}
  warn(): void {}
  error(): void {}
}

export const defaultLogger = new ConsoleLogger();
