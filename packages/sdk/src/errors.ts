/**
 * Error types for dealbook store operations
 *
 * Invariants:
 * - Errors about a file include its path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Patch field rejections are data on PatchResult, never one of these
 */

/**
 * Base class for all dealbook errors
 */
export abstract class DealbookError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the durable file fails structural validation and no backup could repair it
 */
export class IntegrityError extends DealbookError {
  readonly code = "E_INTEGRITY";

  constructor(
    public readonly filePath: string,
    public readonly problems: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Integrity check failed for ${filePath}: ${problems.join("; ")}`, options);
  }
}

/**
 * Thrown when a file is stamped with a schema version outside the supported set
 */
export class UnsupportedVersionError extends DealbookError {
  readonly code = "E_VERSION";

  constructor(
    public readonly filePath: string,
    public readonly version: string,
    public readonly supported: readonly string[],
    options?: ErrorOptions
  ) {
    super(
      `Unsupported schema version: ${version} in ${filePath} (supported: ${supported.join(", ")})`,
      options
    );
  }
}

/**
 * Thrown when the cross-process lock marker cannot be created within the retry budget
 */
export class LockTimeoutError extends DealbookError {
  readonly code = "E_LOCK_TIMEOUT";

  constructor(
    public readonly lockPath: string,
    public readonly attempts: number,
    options?: ErrorOptions
  ) {
    super(
      `Failed to acquire lock after ${attempts} attempts: ${lockPath}. ` +
        `If no other process is writing, the marker may be stale and can be removed manually.`,
      options
    );
  }
}

/**
 * Thrown when a record or file does not exist
 */
export class NotFoundError extends DealbookError {
  readonly code = "ENOENT";

  constructor(target: string, options?: ErrorOptions) {
    super(`Not found: ${target}`, options);
  }
}

/**
 * Thrown when reading a file fails
 */
export class DocumentReadError extends DealbookError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read file: ${filePath}`, options);
  }
}

/**
 * Thrown when writing or replacing a file fails
 */
export class DocumentWriteError extends DealbookError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends DealbookError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends DealbookError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * Thrown when store configuration is invalid
 */
export class ConfigError extends DealbookError {
  readonly code = "E_CONFIG";

  constructor(
    public readonly source: string,
    public readonly issues: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Invalid configuration in ${source}:\n  - ${issues.join("\n  - ")}`, options);
  }
}

/**
 * Extract the errno-style code from an unknown thrown value
 */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
