export class ConfigLoadError extends Error {
  /** Lint errors, when the document parsed but did not validate. */
  readonly errors: string[];

  constructor(message: string, options: { cause?: unknown; errors?: string[] } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ConfigLoadError';
    this.errors = options.errors ?? [];
  }
}
