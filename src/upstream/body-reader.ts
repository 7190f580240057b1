import { DomainError } from '../domain/errors.js';

export const MAX_RESPONSE_BYTES = 10 * 1024 * 1024;

export interface ByteStreamReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
}

export interface ByteStream {
  getReader(): ByteStreamReader;
}

/**
 * Reads a response body into memory. A body that reaches `maxBytes` is rejected,
 * never truncated.
 */
export async function readBodyCapped(body: ByteStream | null, maxBytes = MAX_RESPONSE_BYTES): Promise<Buffer> {
  if (!body) return Buffer.alloc(0);

  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    if (!value) continue;

    total += value.byteLength;
    if (total >= maxBytes) {
      await reader.cancel();
      throw new DomainError('APIError', `response too large (exceeded ${maxBytes} bytes)`);
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks);
}
