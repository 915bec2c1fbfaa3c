export class ApodError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidDateError extends ApodError {
  constructor(public readonly value: string, reason: string) {
    super(`Invalid APOD date "${value}": ${reason}`);
  }
}

export class RateLimitedError extends ApodError {
  constructor(
    public readonly url: string,
    public readonly bodyText: string,
    public readonly retryAfter: string | null = null,
  ) {
    super(`Rate limit exceeded for ${url}`);
  }
}

export class UpstreamError extends ApodError {
  constructor(public readonly url: string, public readonly status: number, public readonly bodyText: string) {
    super(`HTTP ${status} for ${url}`);
  }
}

export class MalformedResponseError extends ApodError {
  constructor(public readonly url: string, public readonly missing: string[], public readonly bodyText: string) {
    super(
      missing.length
        ? `Malformed APOD response from ${url}: missing ${missing.join(', ')}`
        : `Malformed APOD response from ${url}: body is not a JSON object`,
    );
  }
}

export class NetworkError extends ApodError {
  constructor(public readonly url: string, public readonly timedOut: boolean, cause: unknown) {
    super(
      timedOut
        ? `Request to ${url} timed out`
        : `Request to ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class ConfigError extends ApodError {
  constructor(public readonly key: string, public readonly value: string) {
    super(`Invalid value for ${key}: "${value}"`);
  }
}
