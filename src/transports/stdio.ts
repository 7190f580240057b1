import type { Readable, Writable } from 'node:stream';
import type { Logger } from 'pino';
import { errorMessage } from '../domain/errors.js';
import type { McpDispatcher } from '../mcp/dispatcher.js';
import { background, withCancel, type CallContext } from '../util/context.js';

export interface StdioTransportStreams {
  input: Readable;
  output: Writable;
}

/**
 * Newline-delimited JSON-RPC over a pair of streams. Each line is dispatched as
 * soon as it arrives; responses are written in completion order.
 */
export class StdioTransport {
  private readBuffer = '';
  private readonly inFlight = new Set<Promise<void>>();
  private readonly root: { ctx: CallContext; cancel: () => void };
  private closed = false;
  private finish?: () => void;

  constructor(
    private readonly dispatcher: McpDispatcher,
    private readonly logger: Logger,
    private readonly streams: StdioTransportStreams = { input: process.stdin, output: process.stdout }
  ) {
    this.root = withCancel(background());
  }

  /**
   * Resolves once the input has ended, or `close()` was called, and every
   * in-flight call has been answered.
   */
  start(): Promise<void> {
    const { input } = this.streams;
    input.setEncoding('utf-8');

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      this.finish = () => {
        if (settled) return;
        settled = true;
        this.drain().then(resolve, reject);
      };

      input.on('data', this.onData);

      input.on('end', () => {
        if (this.readBuffer.trim()) {
          this.enqueue(this.readBuffer.trim());
        }
        this.readBuffer = '';
        this.finish?.();
      });

      input.on('error', (error) => {
        this.logger.error({ err: error.message }, 'stdio input failed');
        this.root.cancel();
        settled = true;
        reject(error);
      });

      if (this.closed) this.finish?.();
    });
  }

  /**
   * Stops reading and cancels in-flight calls; their error responses are still
   * written before `start()` resolves.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.root.cancel();

    const { input } = this.streams;
    input.removeListener('data', this.onData);
    input.pause();
    this.readBuffer = '';
    this.finish?.();
  }

  private readonly onData = (chunk: string): void => {
    this.readBuffer += chunk;
    this.consumeBuffer();
  };

  private consumeBuffer(): void {
    const lines = this.readBuffer.split('\n');
    this.readBuffer = lines.pop() ?? '';

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      this.enqueue(trimmed);
    }
  }

  private enqueue(line: string): void {
    const task = this.dispatcher
      .dispatch(this.root.ctx, line)
      .then((outcome) => {
        if (outcome.notification) return;
        this.streams.output.write(`${outcome.body}\n`);
      })
      .catch((error: unknown) => {
        this.logger.error({ err: errorMessage(error) }, 'Failed to write response');
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
