/**
 * Base error class for all stylescan errors
 */
export class StylescanError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "StylescanError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for invalid user input (CLI options, config values)
 */
export class ValidationError extends StylescanError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for an invalid pattern catalog. Raised before any scanning starts.
 */
export class ConfigError extends StylescanError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Error for a scan root that is missing, not a directory, or unreadable
 */
export class FilesystemError extends StylescanError {
  constructor(
    message: string,
    public readonly path: string,
    context?: Record<string, unknown>
  ) {
    super(message, "FILESYSTEM_ERROR", { ...context, path });
    this.name = "FilesystemError";
  }
}

/**
 * Error for a single file that could not be read during the walk.
 * Recoverable: the scan logs it and moves on.
 */
export class FileReadError extends StylescanError {
  constructor(
    message: string,
    public readonly filePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, "FILE_READ_ERROR", { ...context, filePath });
    this.name = "FileReadError";
  }
}

/**
 * Error for a report that could not be written
 */
export class OutputWriteError extends StylescanError {
  constructor(
    message: string,
    public readonly outputPath: string,
    context?: Record<string, unknown>
  ) {
    super(message, "OUTPUT_WRITE_ERROR", { ...context, outputPath });
    this.name = "OutputWriteError";
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
