import type { Logger } from 'pino';
import { z } from 'zod';
import { DomainError, errorMessage, isDomainError } from '../domain/errors.js';
import { ensureDeadline, type CallContext } from '../util/context.js';
import { ErrorCode, McpError, toJsonRpcError } from './error-mapper.js';
import type {
  InitializeResult,
  JsonRpcError,
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  LogNotificationLevel,
  ToolCallResult,
  ToolListResult
} from './protocol.js';
import {
  DEFAULT_CALL_TIMEOUT_MS,
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_METHODS,
  SUPPORTED_PROTOCOL_VERSIONS
} from './protocol-constants.js';
import type { ToolRegistry } from './registry.js';

// Used when even the error response cannot be serialized.
const FALLBACK_RESPONSE = '{"jsonrpc":"2.0","id":null,"error":{"code":-32603,"message":"Internal error"}}';

const jsonRpcSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.unknown().optional()
});

const toolCallParamsSchema = z.object({
  name: z.string({ required_error: 'tool name is required' }).min(1, 'tool name is required'),
  arguments: z.record(z.unknown()).optional()
});

export interface DispatcherOptions {
  defaultTimeoutMs?: number;
  serverInfo: { name: string; version: string };
}

export interface DispatchOutcome {
  body: string;
  /** No response is owed: the message was a well-formed notification. */
  notification: boolean;
}

export class McpDispatcher {
  private readonly defaultTimeoutMs: number;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly logger: Logger,
    private readonly options: DispatcherOptions
  ) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
  }

  /**
   * Always resolves to a serialized JSON-RPC response.
   */
  async handle(ctx: CallContext, raw: string | Uint8Array): Promise<string> {
    return (await this.dispatch(ctx, raw)).body;
  }

  async dispatch(ctx: CallContext, raw: string | Uint8Array): Promise<DispatchOutcome> {
    const callCtx = ensureDeadline(ctx, this.defaultTimeoutMs);
    const text = typeof raw === 'string' ? raw : Buffer.from(raw).toString('utf-8');
    this.logger.debug({ requestSize: text.length }, 'Handling MCP request');

    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch (error) {
      this.logger.warn({ err: errorMessage(error) }, 'Failed to parse MCP request');
      return this.reply(this.error(null, ErrorCode.ParseError, 'Parse error'));
    }

    const parsed = jsonRpcSchema.safeParse(message);
    if (!parsed.success) {
      const id = this.extractId(message);
      this.logger.warn({ id, issue: parsed.error.issues[0]?.path.join('.') }, 'Invalid JSON-RPC request');
      return this.reply(this.error(id, ErrorCode.InvalidRequest, 'Invalid Request'));
    }

    const request: JsonRpcRequest = parsed.data;
    const id = request.id ?? null;
    const notification = request.id === undefined && request.method.startsWith('notifications/');
    this.logger.info({ method: request.method, id }, 'Processing MCP request');

    let response: JsonRpcResponse;
    try {
      response = this.success(id, await this.route(callCtx, request));
    } catch (error) {
      const mapped = toJsonRpcError(error);
      this.logger.warn({ method: request.method, id, code: mapped.code }, 'MCP request failed');
      response = { jsonrpc: '2.0', id, error: mapped };
    }

    const body = this.serialize(response);
    this.logger.info({ method: request.method, id, responseSize: body.length }, 'MCP request processed');
    return { body, notification };
  }

  /**
   * Checks the envelope without executing anything.
   */
  validateEnvelope(raw: string): DomainError | null {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      return new DomainError('MCPProtocol', 'invalid JSON');
    }
    const parsed = jsonRpcSchema.safeParse(message);
    if (parsed.success) return null;
    const issue = parsed.error.issues[0];
    if (issue?.path[0] === 'jsonrpc') return new DomainError('MCPProtocol', 'invalid JSONRPC version');
    if (issue?.path[0] === 'method') return new DomainError('MCPProtocol', 'method is required');
    return new DomainError('MCPProtocol', 'invalid request envelope');
  }

  supportedMethods(): string[] {
    return [...SUPPORTED_METHODS];
  }

  createNotification(method: string, params?: unknown): string {
    const notification: JsonRpcNotification = { jsonrpc: '2.0', method, params };
    return JSON.stringify(notification);
  }

  logNotification(level: LogNotificationLevel, message: string, data?: unknown): string {
    return this.createNotification('notifications/message', {
      level,
      logger: this.options.serverInfo.name,
      data: data === undefined ? message : { message, data }
    });
  }

  private async route(ctx: CallContext, request: JsonRpcRequest): Promise<unknown> {
    switch (request.method) {
      case 'initialize':
        return this.initialize(request.params);

      case 'ping':
        return {};

      case 'tools/list': {
        const result: ToolListResult = { tools: this.registry.list() };
        this.logger.info({ count: result.tools.length }, 'Tools listed');
        return result;
      }

      case 'tools/call':
        return this.callTool(ctx, request.params);

      default:
        if (request.method.startsWith('notifications/')) {
          this.logger.debug({ method: request.method }, 'Notification received');
          return {};
        }
        this.logger.warn({ method: request.method }, 'Unknown MCP method');
        throw new McpError(ErrorCode.MethodNotFound, `Method not found: ${request.method}`);
    }
  }

  private initialize(params: unknown): InitializeResult {
    const requested =
      params && typeof params === 'object' && 'protocolVersion' in params ? params.protocolVersion : undefined;
    const protocolVersion = SUPPORTED_PROTOCOL_VERSIONS.find((version) => version === requested) ?? LATEST_PROTOCOL_VERSION;

    return {
      protocolVersion,
      capabilities: { tools: {} },
      serverInfo: this.options.serverInfo
    };
  }

  private async callTool(ctx: CallContext, params: unknown): Promise<ToolCallResult> {
    const parsed = toolCallParamsSchema.safeParse(params ?? {});
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? 'invalid params';
      this.logger.warn({ reason }, 'Invalid tools/call params');
      throw new McpError(ErrorCode.InvalidParams, 'Invalid params', reason);
    }

    const { name, arguments: args = {} } = parsed.data;
    this.logger.debug({ toolName: name, argsCount: Object.keys(args).length }, 'Parsed tool call parameters');

    const outcome = await this.registry.execute(ctx, name, args);
    if (isDomainError(outcome.error, 'ToolNotFound')) {
      throw outcome.error;
    }

    const { result } = outcome;
    const callResult: ToolCallResult = {
      content: [{ type: 'text', text: result.content }],
      isError: result.isError
    };
    if (result.metadata) callResult.metadata = result.metadata;
    if (result.citations && result.citations.length > 0) callResult.citations = result.citations;

    this.logger.info(
      { toolName: name, resultError: result.isError, contentLength: result.content.length },
      'Tool call completed'
    );
    return callResult;
  }

  private serialize(response: JsonRpcResponse): string {
    try {
      return JSON.stringify(response);
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, 'Failed to serialize MCP response');
    }

    try {
      return JSON.stringify(this.error(response.id, ErrorCode.InternalError, 'Internal error'));
    } catch {
      return FALLBACK_RESPONSE;
    }
  }

  private reply(response: JsonRpcResponse): DispatchOutcome {
    return { body: this.serialize(response), notification: false };
  }

  private extractId(message: unknown): JsonRpcId {
    if (!message || typeof message !== 'object' || !('id' in message)) return null;
    const { id } = message;
    return typeof id === 'string' || typeof id === 'number' ? id : null;
  }

  private success(id: JsonRpcId, result: unknown): JsonRpcResponse {
    return { jsonrpc: '2.0', id, result };
  }

  private error(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
    const error: JsonRpcError = data === undefined ? { code, message } : { code, message, data };
    return { jsonrpc: '2.0', id, error };
  }
}
