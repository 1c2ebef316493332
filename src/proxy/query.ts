import { z } from 'zod';
import type { ChatRequest, ChatOptions } from '../upstream/client.js';

const TEMPERATURE_RANGE = [0, 2] as const;
const TOP_P_RANGE = [0, 1] as const;

// eslint-disable-next-line no-control-regex
const ANSI_ESCAPE_REGEX = /\x1B[@-_][0-?]*[ -/]*[@-~]/g;
const SHELL_METACHAR_REGEX = /[;&|]/;

/**
 * Body of POST /query. Only `query` is required; the rest mirrors the
 * generation options of the inference server.
 */
const QueryPayloadSchema = z.object({
  query: z.string().optional(),
  model: z.string().optional(),
  context: z.string().default(''),
  temperature: z.number().default(0.7),
  top_p: z.number().default(0.9),
  top_k: z.number().int().default(40),
  num_predict: z.number().int().default(2048),
  // Comma-separated stop sequences
  stop: z.string().default(''),
  // Accepted for compatibility; the upstream call is always non-streaming
  stream: z.boolean().default(false),
  format: z.string().default(''),
  num_ctx: z.number().int().positive().default(4096),
  num_gpu: z.number().int().nonnegative().default(1),
  num_thread: z.number().int().positive().default(4),
});

export type QueryPayload = z.infer<typeof QueryPayloadSchema>;

export interface ModelPolicy {
  default: string;
  allowed: readonly string[];
}

export type QueryValidation =
  | { ok: true; request: ChatRequest }
  | { ok: false; error: string };

/**
 * Strip ANSI escape codes and log-style INFO lines, then collapse the
 * remaining lines into one.
 */
export function cleanQuery(input: string): string {
  const stripped = input.replace(ANSI_ESCAPE_REGEX, '').trim();
  return stripped
    .split(/\r\n|\r|\n/)
    .filter((line) => !line.startsWith('INFO'))
    .map((line) => line.trim())
    .join(' ');
}

export function parseStopSequences(stop: string): string[] {
  return stop
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function validatePayload(
  query: string,
  model: string,
  payload: QueryPayload,
  models: ModelPolicy
): string | undefined {
  if (!models.allowed.includes(model)) {
    return `Invalid model. Allowed models: ${models.allowed.join(', ')}`;
  }

  // Path traversal and shell metacharacters are rejected outright
  if (query.includes('..') || query.startsWith('/')) {
    return 'Invalid query';
  }
  if (SHELL_METACHAR_REGEX.test(query)) {
    return 'Invalid characters in query';
  }

  if (payload.temperature < TEMPERATURE_RANGE[0] || payload.temperature > TEMPERATURE_RANGE[1]) {
    return 'temperature must be between 0.0 and 2.0';
  }
  if (payload.top_p < TOP_P_RANGE[0] || payload.top_p > TOP_P_RANGE[1]) {
    return 'top_p must be between 0.0 and 1.0';
  }
  if (payload.top_k < 0) {
    return 'top_k must be non-negative';
  }
  if (payload.num_predict < 0) {
    return 'num_predict must be non-negative';
  }
  return undefined;
}

/**
 * Validate a /query body and translate it into a chat request for the upstream.
 */
export function buildChatRequest(body: unknown, models: ModelPolicy): QueryValidation {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return { ok: false, error: 'Request body must be a JSON object' };
  }

  const parsed = QueryPayloadSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: `${issue.path.join('.')}: ${issue.message}` };
  }

  const payload = parsed.data;
  const query = payload.query;
  if (!query) {
    return { ok: false, error: 'query is required' };
  }

  const model = payload.model && payload.model.trim() !== '' ? payload.model : models.default;
  const error = validatePayload(query, model, payload, models);
  if (error) {
    return { ok: false, error };
  }

  const options: ChatOptions = {
    num_ctx: payload.num_ctx,
    num_gpu: payload.num_gpu,
    num_thread: payload.num_thread,
    temperature: payload.temperature,
    top_p: payload.top_p,
    top_k: payload.top_k,
    num_predict: payload.num_predict,
  };
  const stop = parseStopSequences(payload.stop);
  if (stop.length > 0) {
    options.stop = stop;
  }

  const request: ChatRequest = {
    model,
    messages: [
      { role: 'system', content: payload.context },
      { role: 'user', content: cleanQuery(query) },
    ],
    options,
    stream: false,
  };
  if (payload.format) {
    request.format = payload.format;
  }

  return { ok: true, request };
}
