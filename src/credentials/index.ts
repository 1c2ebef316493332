import { timingSafeEqual } from 'crypto';
import { z } from 'zod';
import type { Logger } from 'pino';
import { ConfigError } from '../errors.js';
import type { AuthVerdict, Credential, CredentialSet, DuplicateToken } from './types.js';

export type { AuthVerdict, Credential, CredentialSet, DuplicateToken } from './types.js';

// One entry of the API_KEYS array: {"appname": "APP1", "key": "..."}
const ApiKeyEntrySchema = z.object({
  appname: z.string().min(1),
  // The bearer grammar allows no whitespace inside a token
  key: z.string().min(1).regex(/^\S+$/, 'must not contain whitespace'),
});

const ApiKeysSchema = z.array(ApiKeyEntrySchema);

export interface CredentialLoadResult {
  credentials: CredentialSet;
  duplicates: DuplicateToken[];
  error?: ConfigError;
}

const EMPTY: CredentialSet = Object.freeze([]);

/**
 * Parse the API_KEYS configuration value. Never throws: malformed input
 * degrades to an empty set and the reason is returned in `error`.
 */
export function loadCredentials(raw: string | undefined): CredentialLoadResult {
  if (raw === undefined || raw.trim() === '') {
    return { credentials: EMPTY, duplicates: [] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return {
      credentials: EMPTY,
      duplicates: [],
      error: new ConfigError('API_KEYS is not valid JSON', err),
    };
  }

  const result = ApiKeysSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return {
      credentials: EMPTY,
      duplicates: [],
      error: new ConfigError(`API_KEYS has the wrong shape${where}: ${issue.message}`, result.error),
    };
  }

  const credentials: CredentialSet = Object.freeze(
    result.data.map((entry) => Object.freeze({ identity: entry.appname, token: entry.key }))
  );
  return { credentials, duplicates: findDuplicateTokens(credentials) };
}

function findDuplicateTokens(credentials: CredentialSet): DuplicateToken[] {
  const byToken = new Map<string, DuplicateToken>();
  for (const { identity, token } of credentials) {
    const existing = byToken.get(token);
    if (existing) {
      existing.shadowed.push(identity);
    } else {
      byToken.set(token, { identity, shadowed: [] });
    }
  }
  return [...byToken.values()].filter((entry) => entry.shadowed.length > 0);
}

/**
 * Constant-time string comparison to prevent timing attacks
 */
function safeCompare(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}

/**
 * Linear scan in parse order; the first credential whose token matches wins.
 */
export function lookupCredential(credentials: CredentialSet, presentedToken: string): AuthVerdict {
  if (presentedToken === '') {
    return { authorized: false };
  }
  for (const credential of credentials) {
    if (safeCompare(credential.token, presentedToken)) {
      return { authorized: true, identity: credential.identity };
    }
  }
  return { authorized: false };
}

export class CredentialStore {
  readonly credentials: CredentialSet;

  constructor(credentials: readonly Credential[]) {
    this.credentials = Object.freeze(credentials.map((c) => Object.freeze({ ...c })));
  }

  /**
   * Build the store from the raw API_KEYS value, logging any degradation.
   */
  static fromConfig(raw: string | undefined, logger: Logger): CredentialStore {
    const { credentials, duplicates, error } = loadCredentials(raw);

    if (error) {
      logger.error(
        { err: error.message },
        'Could not parse API_KEYS, all protected requests will be rejected'
      );
    } else if (credentials.length === 0) {
      logger.warn('No API keys configured, all protected requests will be rejected');
    } else {
      logger.info(
        { identities: credentials.map((c) => c.identity) },
        'API keys loaded'
      );
    }

    for (const duplicate of duplicates) {
      logger.warn(
        { identity: duplicate.identity, shadowed: duplicate.shadowed },
        'Several identities share one API key, the first one wins'
      );
    }

    return new CredentialStore(credentials);
  }

  get size(): number {
    return this.credentials.length;
  }

  lookup(presentedToken: string): AuthVerdict {
    return lookupCredential(this.credentials, presentedToken);
  }
}
