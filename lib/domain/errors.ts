// Domain error hierarchy — no external imports.

/** Base class for domain-level errors. */
export abstract class DomainError extends Error {
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.cause = options?.cause;
  }
}

/** Header block does not start with the start marker, or a line is not `key: value`. */
export class MalformedHeaderError extends DomainError {
  readonly line: number;

  constructor(line: number, message: string) {
    super(`line ${line}: ${message}`);
    this.line = line;
  }
}

/** The end marker never appeared. */
export class UnterminatedHeaderError extends DomainError {}

export class MissingCredentialError extends DomainError {}

export class MutuallyExclusiveFlagsError extends DomainError {
  constructor(a: string, b: string) {
    super(`${a} and ${b} are mutually exclusive.`);
  }
}

/** Thrown when option values fail validation. */
export class ConfigError extends DomainError {
  constructor(message: string, options?: { cause?: unknown; field?: string }) {
    super(
      options?.field ? `${message} (field: ${options.field})` : message,
      { cause: options?.cause },
    );
  }
}

/** Non-2xx response, transport failure, or a response body of the wrong shape. */
export class RemoteRequestFailedError extends DomainError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}
