/**
 * Malformed credential configuration. Never reaches a client: the credential
 * store degrades to an empty set and the error is logged at startup.
 */
export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

export type UpstreamFailureKind =
  | 'connection_refused'
  | 'timeout'
  | 'dns_failure'
  | 'invalid_endpoint'
  | 'request_error';

/**
 * The inference service could not be reached, or did not answer in time.
 */
export class UpstreamUnavailableError extends Error {
  constructor(
    readonly kind: UpstreamFailureKind,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'UpstreamUnavailableError';
  }
}

/**
 * Map a fetch() rejection to a short failure classification.
 * Undici wraps socket errors in a TypeError whose `cause` carries the errno code.
 */
export function classifyFetchError(err: unknown): UpstreamFailureKind {
  if (err === null || typeof err !== 'object') {
    return 'request_error';
  }
  // AbortSignal.timeout() rejects with a DOMException named TimeoutError
  const name = 'name' in err ? err.name : undefined;
  if (name === 'TimeoutError' || name === 'AbortError') {
    return 'timeout';
  }
  const code = errorCode('cause' in err ? err.cause : undefined) ?? errorCode(err);
  switch (code) {
    case 'ECONNREFUSED':
    case 'ECONNRESET':
    case 'EHOSTUNREACH':
    case 'ENETUNREACH':
      return 'connection_refused';
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return 'dns_failure';
    case 'ETIMEDOUT':
    case 'UND_ERR_CONNECT_TIMEOUT':
    case 'UND_ERR_HEADERS_TIMEOUT':
      return 'timeout';
    default:
      return 'request_error';
  }
}

function errorCode(value: unknown): string | undefined {
  if (value !== null && typeof value === 'object' && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}
