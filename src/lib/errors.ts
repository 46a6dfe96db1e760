/**
 * Failures that abort a walkthrough run. Each carries the context needed to
 * report it: the URL, the field, or the output path.
 */

export class TransportError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, options: { status?: number; cause?: unknown } = {}) {
    const detail = options.status !== undefined ? `HTTP ${options.status}` : 'request failed';
    super(`GET ${url}: ${detail}`, { cause: options.cause });
    this.name = 'TransportError';
    this.url = url;
    this.status = options.status;
  }
}

export class ResponseParseError extends Error {
  readonly url: string;
  readonly field: string;

  constructor(url: string, field: string, message: string, cause?: unknown) {
    super(`Unexpected response from ${url} at "${field}": ${message}`, { cause });
    this.name = 'ResponseParseError';
    this.url = url;
    this.field = field;
  }
}

export class MissingFieldError extends Error {
  readonly field: string;

  constructor(field: string, message?: string) {
    super(message ?? `Missing field "${field}" in project description`);
    this.name = 'MissingFieldError';
    this.field = field;
  }
}

export class SelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SelectionError';
  }
}

export class OutputWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${path}: ${reason}`, { cause });
    this.name = 'OutputWriteError';
    this.path = path;
  }
}

/** A command-line flag or environment variable with an unusable value. */
export class ConfigError extends Error {
  readonly option: string;

  constructor(option: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.option = option;
  }
}
