/**
 * Error types shared across the digest service
 */

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export class DigestAbortedError extends Error {
  constructor(stage: string) {
    super(`Digest generation aborted during ${stage}`);
    this.name = "DigestAbortedError";
  }
}

export class FetchError extends Error {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(`Failed to fetch ${url} after ${attempts} attempts`, { cause });
    this.name = "FetchError";
  }
}

export class TelegramApiError extends Error {
  constructor(
    public readonly method: string,
    public readonly errorCode: number,
    description: string
  ) {
    super(`Telegram ${method} failed: ${errorCode} ${description}`);
    this.name = "TelegramApiError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
