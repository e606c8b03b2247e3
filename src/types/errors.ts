/**
 * Custom error classes for querywarden.
 *
 * These never cross a pipeline stage boundary: each stage catches them and
 * translates them into a structured rejection (see types/models.ts).
 */

function formatSuggestions(message: string, suggestions: string[]): string {
  if (suggestions.length === 0) {
    return message;
  }
  return `${message}\n\nSuggested fixes:\n${suggestions.map((s) => `  • ${s}`).join('\n')}`;
}

/**
 * Why the generation engine could not produce a candidate.
 */
export type GenerationFailureKind = 'Unavailable' | 'Timeout' | 'Malformed';

/**
 * Error thrown when the natural-language generation engine fails.
 *
 * The candidate producer swallows this and falls back to templates, so it is
 * only ever seen in logs.
 */
export class GenerationUnavailableError extends Error {
  public readonly kind: GenerationFailureKind;
  public readonly suggestions: string[];

  constructor(kind: GenerationFailureKind, message: string, suggestions?: string[]) {
    const list = suggestions ?? GenerationUnavailableError.getDefaultSuggestions(kind);
    super(formatSuggestions(message, list));
    this.name = 'GenerationUnavailableError';
    this.kind = kind;
    this.suggestions = list;
    Object.setPrototypeOf(this, GenerationUnavailableError.prototype);
  }

  private static getDefaultSuggestions(kind: GenerationFailureKind): string[] {
    switch (kind) {
      case 'Timeout':
        return [
          'Raise GENERATION_TIMEOUT_MS if the provider is consistently slow',
          'Check the provider status page for degraded service',
        ];
      case 'Malformed':
        return ['Try a model that follows "return only SQL" instructions more strictly'];
      default:
        return [
          'Verify the API key (ANTHROPIC_API_KEY or OPENAI_API_KEY)',
          'Check API quota and rate limits with your provider',
        ];
    }
  }
}

/**
 * Database failure categories surfaced by the execution channel.
 */
export type DatabaseFailureKind = 'Timeout' | 'ConnectionError' | 'RejectedByDatabase';

/**
 * Error thrown by the database channel.
 *
 * `detail` keeps the driver's own text for server-side logs; it is never
 * forwarded to callers.
 */
export class DatabaseError extends Error {
  public readonly kind: DatabaseFailureKind;
  public readonly detail: string;

  constructor(kind: DatabaseFailureKind, detail: string) {
    super(`Database ${kind}: ${detail}`);
    this.name = 'DatabaseError';
    this.kind = kind;
    this.detail = detail;
    Object.setPrototypeOf(this, DatabaseError.prototype);
  }
}

/**
 * Error thrown when the schema catalog cannot be built.
 *
 * Common causes:
 * - Database unreachable at start-up
 * - Database user lacks permission to read metadata
 */
export class CatalogUnavailableError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const list = suggestions ?? [
      'Verify the database connection (DATABASE_URL or DATABASE_PATH)',
      'Check that the database user can read table metadata',
    ];
    super(formatSuggestions(message, list));
    this.name = 'CatalogUnavailableError';
    this.suggestions = list;
    Object.setPrototypeOf(this, CatalogUnavailableError.prototype);
  }
}

/**
 * Error thrown when configuration or the access policy file is invalid.
 */
export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Render any thrown value as a log-friendly string.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
