import { UpstreamUnavailableError, classifyFetchError } from '../errors.js';
import { checkUpstream, upstreamUrl } from './probe.js';
import type { UpstreamHealth } from './types.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  temperature: number;
  top_p: number;
  top_k: number;
  num_predict: number;
  num_ctx: number;
  num_gpu: number;
  num_thread: number;
  stop?: string[];
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  options: ChatOptions;
  stream: false;
  format?: string;
}

/** Upstream answer, relayed to the caller without modification */
export interface UpstreamResponse {
  status: number;
  contentType: string | null;
  body: Buffer;
}

export interface UpstreamClientOptions {
  probeTimeoutMs: number;
  requestTimeoutMs: number;
  /** Model downloads take far longer than a chat call */
  pullTimeoutMs: number;
}

interface TagsResponse {
  models?: Array<{ name?: unknown }>;
}

export class UpstreamClient {
  readonly baseUrl: string;
  private options: UpstreamClientOptions;

  constructor(baseUrl: string, options: UpstreamClientOptions) {
    this.baseUrl = baseUrl;
    this.options = options;
  }

  /** Fresh probe on every call, never cached */
  check(): Promise<UpstreamHealth> {
    return checkUpstream(this.baseUrl, this.options.probeTimeoutMs);
  }

  /**
   * Single chat call, no retry. Any HTTP status is returned as-is; only a
   * transport failure or timeout throws UpstreamUnavailableError.
   */
  async chat(request: ChatRequest): Promise<UpstreamResponse> {
    const response = await this.send('/api/chat', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(request),
    });
    try {
      const body = Buffer.from(await response.arrayBuffer());
      return { status: response.status, contentType: response.headers.get('content-type'), body };
    } catch (err) {
      // The body read shares the request timeout signal
      throw new UpstreamUnavailableError(classifyFetchError(err), 'Failed to read upstream response', err);
    }
  }

  async listModels(): Promise<string[]> {
    const response = await this.send('/api/tags', {
      method: 'GET',
      headers: { Accept: 'application/json' },
    });
    if (!response.ok) {
      throw new Error(`Upstream responded with status ${response.status} when listing models`);
    }
    const data = (await response.json()) as TagsResponse;
    const models = Array.isArray(data.models) ? data.models : [];
    return models.flatMap((model) => (typeof model.name === 'string' ? [model.name] : []));
  }

  async pullModel(name: string): Promise<void> {
    const response = await this.send('/api/pull', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: name, stream: false }),
    }, this.options.pullTimeoutMs);
    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(`Pulling ${name} failed with status ${response.status}: ${errorBody}`);
    }
    await response.body?.cancel();
  }

  private async send(
    path: string,
    init: RequestInit,
    timeoutMs: number = this.options.requestTimeoutMs
  ): Promise<Response> {
    let target: URL;
    try {
      target = upstreamUrl(this.baseUrl, path);
    } catch (err) {
      throw new UpstreamUnavailableError('invalid_endpoint', `Invalid upstream URL: ${this.baseUrl}`, err);
    }

    try {
      return await fetch(target, {
        ...init,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new UpstreamUnavailableError(classifyFetchError(err), `Request to ${path} failed`, err);
    }
  }
}
