export class ConfigError extends Error {
  override name = 'ConfigError';
}

export class OllamaRequestError extends Error {
  override name = 'OllamaRequestError';

  constructor(message: string, readonly status?: number) {
    super(message);
  }
}

/** The requested model is not installed on the Ollama host. */
export class ModelNotInstalledError extends Error {
  override name = 'ModelNotInstalledError';

  constructor(readonly model: string, readonly available: string[], cause?: unknown) {
    super(
      cause instanceof Error
        ? `Failed to pull model '${model}': ${cause.message}`
        : `Model '${model}' is not installed.`,
    );
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
