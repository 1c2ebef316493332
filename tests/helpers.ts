import pino, { type Logger } from 'pino';

export interface LogRecord {
  level: string;
  msg: string;
  [key: string]: unknown;
}

export interface CapturedLogger {
  logger: Logger;
  /** Raw JSON lines as written by pino */
  raw: string[];
  records(): LogRecord[];
}

/**
 * pino logger writing into memory, with the same level labels as the gateway logger
 */
export function createCapturedLogger(): CapturedLogger {
  const raw: string[] = [];
  const logger = pino(
    {
      level: 'debug',
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    {
      write(line: string) {
        raw.push(line);
      },
    }
  );

  return {
    logger,
    raw,
    records: () => raw.map((line) => JSON.parse(line) as LogRecord),
  };
}

/**
 * Fetch stand-in that never answers on its own and rejects when the request signal aborts
 */
export function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener('abort', () => reject(signal.reason));
  });
}

export function connectionRefused(): TypeError {
  return new TypeError('fetch failed', {
    cause: Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:11434'), { code: 'ECONNREFUSED' }),
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  });
}
