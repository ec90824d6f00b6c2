/**
 * Fetch failure taxonomy
 *
 * Every class here ends up as a degraded cache record; none of them reaches
 * the status line as an exception.
 */

export class CredentialsUnavailableError extends Error {
  constructor(detail?: string) {
    super(detail ? `Cannot read OAuth token: ${detail}` : 'Cannot read OAuth token');
    this.name = 'CredentialsUnavailableError';
  }
}

export class UpstreamHttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number) {
    super(`Upstream error ${status} for ${url}`);
    this.name = 'UpstreamHttpError';
    this.status = status;
    this.url = url;
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export interface FailureDescription {
  reason: string;
  statusCode: number | null;
}

/**
 * Human-readable reason and status code stored on a degraded record.
 */
export function describeFailure(error: unknown): FailureDescription {
  if (error instanceof CredentialsUnavailableError) {
    return { reason: 'Cannot read OAuth token.', statusCode: null };
  }

  if (error instanceof UpstreamHttpError) {
    switch (error.status) {
      case 401:
        return {
          reason: 'OAuth token rejected (HTTP 401). Re-authenticate Claude Code.',
          statusCode: 401,
        };
      case 429:
        return { reason: 'Rate limited by API (HTTP 429).', statusCode: 429 };
      default:
        return { reason: `API request failed (HTTP ${error.status}).`, statusCode: error.status };
    }
  }

  return { reason: 'Request failed (network error or timeout).', statusCode: null };
}
