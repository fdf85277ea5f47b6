export class CorpusError extends Error {
  constructor(
    message: string,
    public readonly internalDetails?: string,
  ) {
    super(message);
    this.name = 'CorpusError';
    Object.setPrototypeOf(this, CorpusError.prototype);
  }
}

export class ConfigurationError extends CorpusError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * The indexing root is missing, unreadable or not a directory.
 */
export class InvalidRootError extends ConfigurationError {
  constructor(
    public readonly root: string,
    internalDetails?: string,
  ) {
    super(`Project path does not exist or is not a readable directory: ${root}`, internalDetails);
    this.name = 'InvalidRootError';
    Object.setPrototypeOf(this, InvalidRootError.prototype);
  }
}

export class ServiceUnavailableError extends CorpusError {
  constructor(
    public readonly apiUrl: string,
    internalDetails?: string,
  ) {
    super(`RAG server is not accessible at ${apiUrl}`, internalDetails);
    this.name = 'ServiceUnavailableError';
    Object.setPrototypeOf(this, ServiceUnavailableError.prototype);
  }
}

export class RetrievalError extends CorpusError {
  constructor(
    message: string,
    public readonly status?: number,
    internalDetails?: string,
  ) {
    super(message, internalDetails);
    this.name = 'RetrievalError';
    Object.setPrototypeOf(this, RetrievalError.prototype);
  }
}

/**
 * A compose command exited non-zero. `internalDetails` carries its stderr.
 */
export class LifecycleError extends CorpusError {
  constructor(message: string, internalDetails?: string) {
    super(message, internalDetails);
    this.name = 'LifecycleError';
    Object.setPrototypeOf(this, LifecycleError.prototype);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
