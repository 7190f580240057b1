import pino, { type Logger } from 'pino';
import type { ConfigProvider } from '../src/config/index.js';
import type { Capability, ExecutionOutcome } from '../src/mcp/capability.js';
import type { UpstreamFetch, UpstreamRequestInit, UpstreamResponse } from '../src/upstream/perplexity-client.js';
import type { ChatCompletionRequest } from '../src/upstream/wire.js';

export const testConfig: ConfigProvider = {
  apiKey: 'test-secret',
  defaultModel: 'sonar',
  requestTimeoutMs: 5000,
  logLevel: 'info'
};

export function captureLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level: 'debug' }, {
    write(line: string) {
      lines.push(JSON.parse(line));
    }
  });
  return { logger, lines };
}

export function jsonResponse(status: number, payload: unknown): UpstreamResponse {
  return new Response(JSON.stringify(payload), { status });
}

export function textResponse(status: number, text: string): UpstreamResponse {
  return new Response(text, { status });
}

export function chatResponse(content: string, overrides: Record<string, unknown> = {}) {
  return {
    id: 'resp-1',
    object: 'chat.completion',
    created: 1700000000,
    model: 'sonar',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 10, completion_tokens: 32, total_tokens: 42 },
    ...overrides
  };
}

export interface RecordedCall {
  url: string;
  init: UpstreamRequestInit;
  body: ChatCompletionRequest;
}

export function recordingFetch(
  respond: (body: ChatCompletionRequest, init: UpstreamRequestInit) => UpstreamResponse | Promise<UpstreamResponse>
): { fetch: UpstreamFetch; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetch: UpstreamFetch = async (url, init) => {
    const body: ChatCompletionRequest = JSON.parse(init.body);
    calls.push({ url, init, body });
    return respond(body, init);
  };
  return { fetch, calls };
}

// Never settles on its own; rejects with the signal's reason once aborted.
export const hangingFetch: UpstreamFetch = (_url, init) =>
  new Promise((_resolve, reject) => {
    init.signal.addEventListener('abort', () => reject(init.signal.reason), { once: true });
  });

export function fakeCapability(
  name: string,
  execute?: Capability['execute'],
  description = `${name} tool`
): Capability {
  const fallback = async (): Promise<ExecutionOutcome> => ({ result: { content: 'ok', isError: false } });
  return {
    name,
    description,
    inputSchema: { type: 'object', properties: {} },
    execute: execute ?? fallback
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
