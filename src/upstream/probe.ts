import { classifyFetchError } from '../errors.js';
import type { UpstreamHealth } from './types.js';

// Lists local models; cheap and read-only
export const PROBE_PATH = '/api/tags';

/**
 * Resolve a path against the upstream base URL, keeping any base path prefix.
 */
export function upstreamUrl(endpoint: URL | string, path: string): URL {
  const base = new URL(endpoint);
  const prefix = base.pathname.replace(/\/+$/, '');
  base.pathname = `${prefix}${path}`;
  base.search = '';
  return base;
}

/**
 * Single reachability check. Never throws: every failure is folded into the result.
 */
export async function checkUpstream(
  endpoint: URL | string,
  timeoutMs: number
): Promise<UpstreamHealth> {
  let target: URL;
  try {
    target = upstreamUrl(endpoint, PROBE_PATH);
  } catch {
    return { reachable: false, checkedAt: new Date(), detail: 'invalid_endpoint' };
  }

  try {
    const response = await fetch(target, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
    // Release the socket, the body is not needed
    await response.body?.cancel();

    if (response.ok) {
      return { reachable: true, checkedAt: new Date() };
    }
    return {
      reachable: false,
      checkedAt: new Date(),
      detail: `unexpected_status:${response.status}`,
    };
  } catch (err) {
    return { reachable: false, checkedAt: new Date(), detail: classifyFetchError(err) };
  }
}
