export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing environment variables: ${missing.join(', ')}`);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

/**
 * Raised by the lookup when the search endpoint answers with anything but 200.
 */
export class RemoteQueryError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Search failed: ${status} ${body}`);
    this.name = 'RemoteQueryError';
    this.status = status;
    this.body = body;
  }
}

export type SearchError = ConfigurationError | RemoteQueryError;

export type SearchResult<T, E extends SearchError = SearchError> =
  | { ok: true; value: T }
  | { ok: false; error: E };
