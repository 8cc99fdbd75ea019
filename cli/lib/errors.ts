export class TransportError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${url} failed: ${reason}`, { cause });
    this.name = 'TransportError';
    this.url = url;
  }
}

export class RequestError extends Error {
  readonly url: string;
  readonly status: number;
  readonly reason: string;

  constructor(url: string, status: number, reason: string) {
    super(`Request failed (${status}) for ${url}: ${reason}`);
    this.name = 'RequestError';
    this.url = url;
    this.status = status;
    this.reason = reason;
  }
}

export class LookupPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LookupPreconditionError';
  }
}
