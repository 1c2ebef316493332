import type { AuthVerdict } from '../credentials/types.js';

export type AuthReason = 'authorized' | 'missing_credential' | 'malformed_header' | 'invalid_credential';

/**
 * Verdict plus the internal reason. The reason is for logs only and is
 * never sent to the caller.
 */
export interface GuardVerdict extends AuthVerdict {
  reason: AuthReason;
}

/** Header bag as Fastify and Node expose it */
export type RequestHeaders = Record<string, string | string[] | undefined>;
