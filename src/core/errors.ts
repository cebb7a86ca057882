/**
 * Error types shared across the application
 */
import type { ZodError } from 'zod';

/**
 * Raised when a title cannot be raced: technical/namespaced titles,
 * missing pages, or pages without outgoing links.
 */
export class InvalidPageError extends Error {
  constructor(public readonly pageTitle?: string) {
    super(`Can't parse wikipedia page ${pageTitle ?? 'this term'}.`);
    this.name = 'InvalidPageError';
  }
}

/**
 * MediaWiki API failure (HTTP status, API-level error, or unexpected body)
 */
export class WikiApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'WikiApiError';
  }

  static http(status: number, statusText: string): WikiApiError {
    return new WikiApiError(`MediaWiki API request failed: ${status} ${statusText}`.trim(), status, 'HTTP_ERROR');
  }

  static api(code: string, info: string): WikiApiError {
    return new WikiApiError(`[${code}] ${info}`, undefined, code);
  }

  static invalidResponse(details: string): WikiApiError {
    return new WikiApiError(`Unexpected MediaWiki API response: ${details}`, undefined, 'INVALID_RESPONSE');
  }
}

export class ComposeFileError extends Error {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`${path}: ${reason}`);
    this.name = 'ComposeFileError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: { field: string; message: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZod(section: string, error: ZodError): ConfigError {
    const issues = error.errors.map((err) => ({
      field: err.path.join('.'),
      message: err.message,
    }));
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
    return new ConfigError(`Invalid ${section} configuration (${summary})`, issues);
  }
}

/**
 * Format any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
