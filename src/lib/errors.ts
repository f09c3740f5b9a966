/**
 * Custom error classes for gitscribe
 *
 * Every failure the CLI can report is one of these. The top-level command
 * handler catches them once, renders them and exits with status 1.
 */

/**
 * Base error class for all gitscribe errors
 */
export class GitscribeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitscribeError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when configuration is missing or invalid
 */
export class ConfigurationError extends GitscribeError {
  public readonly configFile?: string;
  public readonly field?: string;

  constructor(message: string, options: { configFile?: string; field?: string } = {}) {
    super(message);
    this.name = 'ConfigurationError';
    this.configFile = options.configFile;
    this.field = options.field;
  }
}

/**
 * Error thrown when a provider name is not registered
 */
export class UnsupportedProviderError extends ConfigurationError {
  public readonly provider: string;
  public readonly supported: readonly string[];

  constructor(provider: string, supported: readonly string[]) {
    super(`Unsupported provider: ${provider}. Valid options: ${supported.join(', ')}`, {
      field: 'AI_PROVIDER',
    });
    this.name = 'UnsupportedProviderError';
    this.provider = provider;
    this.supported = supported;
  }
}

/**
 * Error thrown when a provider that needs an API key is built without one
 */
export class MissingCredentialError extends ConfigurationError {
  public readonly provider: string;

  constructor(provider: string) {
    super(`API key not found for ${provider}`, { field: 'API_KEY' });
    this.name = 'MissingCredentialError';
    this.provider = provider;
  }
}

/**
 * Error thrown when a git command fails
 */
export class GitCommandError extends GitscribeError {
  public readonly command: string;
  public readonly exitCode?: number;
  public readonly stderr?: string;

  constructor(message: string, options: { command: string; exitCode?: number; stderr?: string }) {
    super(message);
    this.name = 'GitCommandError';
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

/**
 * Error thrown when the staged diff cannot be read, or there is nothing staged
 */
export class DiffUnavailableError extends GitCommandError {
  /** git ran fine but the index holds no changes */
  public readonly nothingStaged: boolean;

  constructor(
    message: string,
    options: { command: string; exitCode?: number; stderr?: string; nothingStaged?: boolean }
  ) {
    super(message, options);
    this.name = 'DiffUnavailableError';
    this.nothingStaged = options.nothingStaged ?? false;
  }
}

/**
 * Base class for failures raised by a generation provider
 */
export class ProviderError extends GitscribeError {
  public readonly provider: string;

  constructor(message: string, provider: string) {
    super(message);
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

/**
 * The request never got a response (DNS, refused connection, timeout)
 */
export class ProviderConnectionError extends ProviderError {
  public readonly url?: string;

  constructor(message: string, options: { provider: string; url?: string; cause?: unknown }) {
    super(message, options.provider);
    this.name = 'ProviderConnectionError';
    this.url = options.url;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The provider answered, but not with a usable completion
 */
export class ProviderResponseError extends ProviderError {
  public readonly status?: number;
  public readonly body?: string;

  constructor(message: string, options: { provider: string; status?: number; body?: string }) {
    super(message, options.provider);
    this.name = 'ProviderResponseError';
    this.status = options.status;
    this.body = options.body;
  }
}

/**
 * The local daemon is not reachable
 */
export class ProviderUnavailableError extends ProviderError {
  public readonly host: string;
  public readonly remediation: string;

  constructor(message: string, options: { provider: string; host: string; remediation: string }) {
    super(message, options.provider);
    this.name = 'ProviderUnavailableError';
    this.host = options.host;
    this.remediation = options.remediation;
  }
}

/**
 * The requested model is not installed on the local daemon
 */
export class ModelNotFoundError extends ProviderError {
  public readonly model: string;
  public readonly available: string[];

  constructor(model: string, options: { provider: string; available?: string[] }) {
    super(`Model "${model}" is not installed`, options.provider);
    this.name = 'ModelNotFoundError';
    this.model = model;
    this.available = options.available ?? [];
  }
}

/**
 * The generated text is empty or does not start with a commit type
 */
export class MalformedGenerationError extends ProviderError {
  public readonly rawText: string;

  constructor(message: string, options: { provider: string; rawText: string }) {
    super(message, options.provider);
    this.name = 'MalformedGenerationError';
    this.rawText = options.rawText;
  }
}

/**
 * Type guard to check if error is a GitscribeError
 */
export function isGitscribeError(error: unknown): error is GitscribeError {
  return error instanceof GitscribeError;
}

/**
 * Type guard to check if error is a GitCommandError
 */
export function isGitCommandError(error: unknown): error is GitCommandError {
  return error instanceof GitCommandError;
}

/**
 * Type guard to check if error is a ProviderError
 */
export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}
