export class ConfigError extends Error {
  override name = "ConfigError";
}

export class ExternalServiceError extends Error {
  override name = "ExternalServiceError";

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class UnsupportedFileTypeError extends Error {
  override name = "UnsupportedFileTypeError";

  constructor(readonly extension: string) {
    super(`Unsupported file type: ${extension || "(none)"}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
