/**
 * Error codes raised while loading vocabularies
 */
export type ValidatorErrorCode =
  | 'FETCH_ERROR' // Network failure or non-success HTTP status
  | 'UNSUPPORTED_FORMAT' // No RDF serialization could be obtained
  | 'PARSE_ERROR' // Malformed RDF
  | 'DISCOVERY_ERROR' // Registry listing unreachable
  | 'CONFIG_ERROR'; // Invalid configuration

/**
 * Base class of all validator errors
 */
export class ValidatorError extends Error {
  public readonly code: ValidatorErrorCode;

  constructor(code: ValidatorErrorCode, message: string) {
    super(message);
    this.name = 'ValidatorError';
    this.code = code;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): { code: ValidatorErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export class FetchError extends ValidatorError {
  public readonly url: string;
  public readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super('FETCH_ERROR', message);
    this.name = 'FetchError';
    this.url = url;
    this.status = status;
  }
}

export class UnsupportedFormatError extends ValidatorError {
  public readonly mediaType: string;

  constructor(mediaType: string, message: string) {
    super('UNSUPPORTED_FORMAT', message);
    this.name = 'UnsupportedFormatError';
    this.mediaType = mediaType;
  }
}

export class ParseError extends ValidatorError {
  constructor(message: string) {
    super('PARSE_ERROR', message);
    this.name = 'ParseError';
  }
}

export class DiscoveryError extends ValidatorError {
  constructor(message: string) {
    super('DISCOVERY_ERROR', message);
    this.name = 'DiscoveryError';
  }
}

export class ConfigError extends ValidatorError {
  public readonly problems: string[];

  constructor(source: string, problems: string[]) {
    super('CONFIG_ERROR', `Invalid configuration in ${source}: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * Render anything thrown as a one-line message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
