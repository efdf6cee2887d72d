/** HTTP method used by the remote endpoints */
export type HttpMethod = 'GET' | 'POST' | 'PATCH';

/**
 * Outgoing request handed to the transport.
 * `url` is absolute and already carries its query string.
 */
export type HttpRequest = {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
};

/**
 * Raw answer of the transport. Header names are lower case.
 */
export type HttpResponse = {
  readonly statusCode: number;
  readonly headers: Readonly<Record<string, string | undefined>>;
  readonly body: string;
};

/**
 * Performs one HTTP exchange.
 * Network errors and timeouts reject; any HTTP status resolves.
 */
export interface HttpTransport {
  readonly send: (request: HttpRequest) => Promise<HttpResponse>;
}

/**
 * Error raised when the per-request budget runs out.
 */
export type RequestTimeoutError = Error & {
  readonly name: 'RequestTimeoutError';
  readonly timeoutMs: number;
};

/**
 * Undici transport options.
 */
export type UndiciTransportOptions = {
  readonly timeoutMs: number;
};
