export class WebmonError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid CLI arguments, config file or site list. Fatal before any network or DB activity. */
export class ConfigError extends WebmonError {}

export class MalformedInputError extends ConfigError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Malformed input "${input}": ${reason}`);
    this.input = input;
  }
}

export class EmptySiteListError extends WebmonError {
  constructor(tableName: string) {
    super(`No websites to monitor: table "${tableName}" is empty`);
  }
}

export class StorageError extends WebmonError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Storage operation "${operation}" failed: ${detail}`, { cause });
    this.operation = operation;
  }
}

export class RetriesExhaustedError extends WebmonError {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(name: string, attempts: number, lastError: unknown) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`${name} failed after ${attempts} attempts: ${detail}`, { cause: lastError });
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class ProbeTimeoutError extends WebmonError {
  constructor(url: string, timeoutMs: number) {
    super(`Healthcheck of ${url} timed out after ${timeoutMs / 1000}s`);
  }
}
