import type { Logger } from 'pino';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ConfigProvider } from '../config/index.js';
import { DomainError, errorMessage, isDomainError } from '../domain/errors.js';
import type { SearchBackend, SearchRequest, SearchResult } from '../domain/search.js';
import { isTimeoutAbort, withTimeout, type CallContext } from '../util/context.js';
import { MAX_RESPONSE_BYTES, readBodyCapped, type ByteStream } from './body-reader.js';
import { toChatCompletionRequest, toSearchResult } from './mapper.js';
import {
  apiErrorEnvelopeSchema,
  chatCompletionResponseSchema,
  type ChatCompletionRequest,
  type ChatCompletionResponse
} from './wire.js';

export const DEFAULT_BASE_URL = 'https://api.perplexity.ai';
export const CHAT_COMPLETIONS_PATH = '/chat/completions';

export interface UpstreamRequestInit {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export interface UpstreamResponse {
  readonly status: number;
  readonly body: ByteStream | null;
}

export type UpstreamFetch = (url: string, init: UpstreamRequestInit) => Promise<UpstreamResponse>;

export interface PerplexityClientOptions {
  baseUrl?: string;
  fetch?: UpstreamFetch;
  maxResponseBytes?: number;
}

export function createTlsFetch(): UpstreamFetch {
  const dispatcher = new Agent({
    connect: { minVersion: 'TLSv1.2', maxVersion: 'TLSv1.3' }
  });
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

export class PerplexityClient implements SearchBackend {
  private readonly baseUrl: string;
  private readonly fetchImpl: UpstreamFetch;
  private readonly maxResponseBytes: number;

  constructor(
    private readonly config: ConfigProvider,
    private readonly logger: Logger,
    options: PerplexityClientOptions = {}
  ) {
    if (!config.apiKey) {
      throw new DomainError('Configuration', 'perplexity API key not configured');
    }
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? createTlsFetch();
    this.maxResponseBytes = options.maxResponseBytes ?? MAX_RESPONSE_BYTES;
  }

  async search(ctx: CallContext, request: SearchRequest): Promise<SearchResult> {
    const model = request.model ?? this.config.defaultModel;
    const body = toChatCompletionRequest({ ...request, model }, this.logger);
    // The request timeout bounds the upstream call even under a longer caller deadline.
    const response = await this.send(withTimeout(ctx, this.config.requestTimeoutMs), body);
    const result = toSearchResult(response);

    this.logger.debug({ requestId: result.id, tokensUsed: result.usage.totalTokens }, 'Search completed');
    return result;
  }

  private async send(ctx: CallContext, body: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    const url = `${this.baseUrl}${CHAT_COMPLETIONS_PATH}`;
    this.logger.debug({ url, model: body.model, messageCount: body.messages.length }, 'Making API request');

    let status: number;
    let raw: Buffer;
    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          accept: 'application/json',
          authorization: `Bearer ${this.config.apiKey}`
        },
        body: JSON.stringify(body),
        signal: ctx.signal
      });
      status = response.status;
      raw = await readBodyCapped(response.body, this.maxResponseBytes);
    } catch (error) {
      throw this.classifyTransportError(ctx, error);
    }

    if (status < 200 || status > 299) {
      throw this.mapErrorResponse(status, raw);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw.toString('utf-8'));
    } catch (error) {
      throw new DomainError('APIError', `failed to parse response: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = chatCompletionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DomainError('APIError', 'unexpected response shape', { cause: parsed.error });
    }
    return parsed.data;
  }

  private classifyTransportError(ctx: CallContext, error: unknown): DomainError {
    if (isDomainError(error)) {
      if (error.kind === 'APIError') {
        this.logger.warn({ maxSize: this.maxResponseBytes }, 'Response body exceeded size limit');
      }
      return error;
    }
    if (isTimeoutAbort(ctx.signal)) {
      return new DomainError('TimeoutError', 'request timed out', { cause: error });
    }
    return new DomainError('NetworkError', `request failed: ${errorMessage(error)}`, { cause: error });
  }

  private mapErrorResponse(status: number, raw: Buffer): DomainError {
    let upstreamMessage: string | null = null;
    try {
      const envelope = apiErrorEnvelopeSchema.safeParse(JSON.parse(raw.toString('utf-8')));
      if (envelope.success) upstreamMessage = envelope.data.error.message;
    } catch {
      upstreamMessage = null;
    }

    // Status and size only: the body may echo request content.
    this.logger.error(
      { statusCode: status, structured: upstreamMessage !== null, bodyLength: raw.length },
      'Upstream API error'
    );

    const detail = (label: string) => (upstreamMessage ? `${label}: ${upstreamMessage}` : label);

    if (status === 400) return new DomainError('InvalidRequest', detail('bad request'));
    if (status === 401) return new DomainError('AuthError', detail('unauthorized'));
    if (status === 429) return new DomainError('RateLimited', detail('rate limit exceeded'));
    if (status >= 500 && status <= 599) return new DomainError('APIError', detail(`server error (HTTP ${status})`));
    return new DomainError('APIError', detail(`HTTP ${status}`));
  }
}
