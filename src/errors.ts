/**
 * Error taxonomy for a report run.
 *
 * Catalog and connection errors are fatal. Build and log errors are
 * recovered per build by the selector and the report runner.
 */

export class FailscopeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CatalogLoadError extends FailscopeError {}

/** A catalog entry whose regular expression does not compile. */
export class MalformedSignatureError extends CatalogLoadError {
  constructor(
    readonly signature: string,
    readonly pattern: string,
    options?: { cause?: unknown }
  ) {
    super(`Signature "${signature}" has an invalid pattern: ${pattern}`, options);
  }
}

export class ConnectionConfigError extends FailscopeError {
  constructor(message: string, readonly guidance?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class BuildNotFoundError extends FailscopeError {
  constructor(readonly jobName: string, readonly buildNumber: number) {
    super(`Build ${jobName} #${buildNumber} not found`);
  }
}

export class LogFetchError extends FailscopeError {
  constructor(
    readonly jobName: string,
    readonly buildNumber: number,
    options?: { cause?: unknown }
  ) {
    super(`Console text unavailable for ${jobName} #${buildNumber}`, options);
  }
}
