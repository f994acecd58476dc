export class ProviderError extends Error {
  public readonly provider: string;
  public readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(message);
    this.name = "ProviderError";
    this.provider = provider;
    this.status = status;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class AdapterTimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "AdapterTimeoutError";
  }
}

export class UnsupportedMediaError extends Error {
  constructor(fileName: string) {
    super(`Unsupported file type: ${fileName}`);
    this.name = "UnsupportedMediaError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
