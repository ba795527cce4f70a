/**
 * Custom error classes for the question pipeline.
 *
 * Generation errors terminate a request and are shown to the user together
 * with the provider and SQL that were attempted. Coercion errors never
 * escape the pipeline: the formatter renders the raw result instead.
 */

function formatSuggestions(message: string, suggestions: string[]): string {
  if (suggestions.length === 0) {
    return message;
  }
  return `${message}\n\nSuggested fixes:\n${suggestions.map((s) => `  • ${s}`).join('\n')}`;
}

export type GenerationErrorKind =
  | 'ProviderUnavailable'
  | 'ProviderFailed'
  | 'Unparseable'
  | 'Unsafe'
  | 'ExecutionFailed';

/**
 * Base class for everything that stops SQL from being produced or executed.
 */
export abstract class GenerationError extends Error {
  abstract readonly kind: GenerationErrorKind;
  public readonly provider?: string;
  public readonly sql?: string;
  public readonly suggestions: string[];
  public readonly detail: string;

  protected constructor(
    message: string,
    options: { provider?: string; sql?: string; cause?: unknown; suggestions: string[] }
  ) {
    super(formatSuggestions(message, options.suggestions), { cause: options.cause });
    this.detail = message;
    this.provider = options.provider;
    this.sql = options.sql;
    this.suggestions = options.suggestions;
  }
}

/**
 * No text-generation provider could be used for the request.
 *
 * Raised before any network call to a model: either nothing in the
 * priority list reports itself available, or the pinned provider is
 * unknown or unavailable.
 */
export class ProviderUnavailableError extends GenerationError {
  readonly kind = 'ProviderUnavailable' as const;

  constructor(message: string, provider?: string) {
    super(message, {
      provider,
      suggestions: [
        'Set GOOGLE_API_KEY, GROQ_API_KEY, ANTHROPIC_API_KEY or OPENAI_API_KEY',
        'Start Ollama locally and check OLLAMA_BASE_URL',
        'Check LLM_PROVIDER / LLM_PRIORITY for typos',
      ],
    });
    this.name = 'ProviderUnavailableError';
    Object.setPrototypeOf(this, ProviderUnavailableError.prototype);
  }
}

/**
 * The selected provider failed to answer (transport error, quota, timeout).
 */
export class ProviderFailedError extends GenerationError {
  readonly kind = 'ProviderFailed' as const;
  public readonly timedOut: boolean;

  constructor(provider: string, cause: unknown, timedOut = false) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      timedOut
        ? `Provider "${provider}" did not answer in time`
        : `Provider "${provider}" failed: ${reason}`,
      {
        provider,
        cause,
        suggestions: [
          'Verify the API key and quota of the provider',
          'Pin another provider for this question',
          'Raise LLM_TIMEOUT_MS if the model is slow',
        ],
      }
    );
    this.name = 'ProviderFailedError';
    this.timedOut = timedOut;
    Object.setPrototypeOf(this, ProviderFailedError.prototype);
  }
}

/**
 * The model answered, but no SQL statement could be extracted.
 */
export class UnparseableSqlError extends GenerationError {
  readonly kind = 'Unparseable' as const;
  public readonly rawOutput: string;

  constructor(rawOutput: string, provider?: string) {
    super('Model output does not start with a SQL statement', {
      provider,
      sql: rawOutput,
      suggestions: [
        'Rephrase the question so it clearly asks for data',
        'Try a different provider',
      ],
    });
    this.name = 'UnparseableSqlError';
    this.rawOutput = rawOutput;
    Object.setPrototypeOf(this, UnparseableSqlError.prototype);
  }
}

/**
 * The extracted SQL would modify data or schema.
 */
export class UnsafeSqlError extends GenerationError {
  readonly kind = 'Unsafe' as const;

  constructor(keyword: string, sql: string, provider?: string) {
    super(`Refusing to run statement containing ${keyword}; only read queries are allowed`, {
      provider,
      sql,
      suggestions: ['Ask a question that reads data instead of changing it'],
    });
    this.name = 'UnsafeSqlError';
    Object.setPrototypeOf(this, UnsafeSqlError.prototype);
  }
}

/**
 * The warehouse rejected or failed to run the generated SQL.
 */
export class ExecutionFailedError extends GenerationError {
  readonly kind = 'ExecutionFailed' as const;

  constructor(provider: string, sql: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Query failed: ${reason}`, {
      provider,
      sql,
      cause,
      suggestions: [
        'Check that the tables and columns in the SQL exist',
        'Check that the database user may read those tables',
        'Rephrase the question and try again',
      ],
    });
    this.name = 'ExecutionFailedError';
    Object.setPrototypeOf(this, ExecutionFailedError.prototype);
  }
}

export type CoercionErrorKind = 'IrregularShape' | 'Malformed';

/**
 * A stringified result could not be turned into typed rows.
 */
export class CoercionError extends Error {
  public readonly kind: CoercionErrorKind;

  constructor(kind: CoercionErrorKind, message: string) {
    super(message);
    this.name = 'CoercionError';
    this.kind = kind;
    Object.setPrototypeOf(this, CoercionError.prototype);
  }
}

/**
 * Environment configuration failed validation.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
