import type { Logger } from 'pino';
import type { CredentialStore } from '../credentials/index.js';
import type { GuardVerdict, RequestHeaders } from './types.js';

export type { AuthReason, GuardVerdict, RequestHeaders } from './types.js';

const BEARER_PREFIX = 'Bearer ';

export class AuthGuard {
  private store: CredentialStore;
  private logger: Logger;

  constructor(store: CredentialStore, logger: Logger) {
    this.store = store;
    this.logger = logger;
  }

  authorize(headers: RequestHeaders): GuardVerdict {
    const verdict = this.evaluate(headers.authorization);

    if (verdict.authorized) {
      this.logger.info({ identity: verdict.identity }, 'Request authorized');
    } else {
      this.logger.warn({ reason: verdict.reason }, 'Request denied');
    }

    return verdict;
  }

  private evaluate(header: string | string[] | undefined): GuardVerdict {
    if (header === undefined || header === '') {
      return { authorized: false, reason: 'missing_credential' };
    }

    // A repeated Authorization header is ambiguous
    if (Array.isArray(header)) {
      return { authorized: false, reason: 'malformed_header' };
    }

    // Case-sensitive scheme, exactly one space, no further whitespace in the token
    if (!header.startsWith(BEARER_PREFIX)) {
      return { authorized: false, reason: 'malformed_header' };
    }
    const token = header.slice(BEARER_PREFIX.length);
    if (token === '' || /\s/.test(token)) {
      return { authorized: false, reason: 'malformed_header' };
    }

    const match = this.store.lookup(token);
    if (!match.authorized) {
      return { authorized: false, reason: 'invalid_credential' };
    }

    return { authorized: true, identity: match.identity, reason: 'authorized' };
  }
}
