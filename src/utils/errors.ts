export interface ErrorPayload {
  code: string;
  message: string;
  timestamp: string;
  details?: unknown;
  stack?: string;
}

/**
 * Base tfdrift error
 */
export class TfDriftError extends Error {
  code: string;
  timestamp: string;
  details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'TfDriftError';
    this.code = code;
    this.timestamp = new Date().toISOString();
    this.details = details;
  }

  toJSON(): ErrorPayload {
    return {
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Wrong number of positional arguments or an unrecognised flag
 */
export class UsageError extends TfDriftError {
  constructor(message: string, details?: unknown) {
    super(message, 'USAGE_ERROR', details);
    this.name = 'UsageError';
  }
}

export class FileAccessError extends TfDriftError {
  constructor(filePath: string, reason: string, systemCode?: string) {
    super(`Cannot read '${filePath}': ${reason}`, 'FILE_ACCESS_ERROR', {
      path: filePath,
      systemCode,
    });
    this.name = 'FileAccessError';
  }
}

export class JsonParseError extends TfDriftError {
  constructor(filePath: string, reason: string) {
    super(`'${filePath}' is not valid JSON: ${reason}`, 'JSON_PARSE_ERROR', { path: filePath });
    this.name = 'JsonParseError';
  }
}

export class ConfigurationError extends TfDriftError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
