import type { Logger } from 'pino';
import { DomainError, errorMessage } from '../domain/errors.js';
import { ensureDeadline, type CallContext } from '../util/context.js';
import type { Capability, ExecutionOutcome, ToolInfo } from './capability.js';
import { DEFAULT_CALL_TIMEOUT_MS, REQUIRED_TOOLS } from './protocol-constants.js';

export interface ToolRegistryOptions {
  defaultTimeoutMs?: number;
  requiredTools?: readonly string[];
}

/**
 * Owns the name → capability map. Mutation and lookups are synchronous, so each
 * runs to completion on the event loop; `execute` resolves the capability before
 * its first await and holds nothing across the call.
 */
export class ToolRegistry {
  private readonly capabilities = new Map<string, Capability>();
  private readonly defaultTimeoutMs: number;
  private readonly requiredTools: readonly string[];

  constructor(
    private readonly logger: Logger,
    options: ToolRegistryOptions = {}
  ) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.requiredTools = options.requiredTools ?? REQUIRED_TOOLS;
  }

  register(name: string, capability: Capability | null | undefined): void {
    if (!name) {
      throw new DomainError('InvalidRequest', 'tool name cannot be empty');
    }
    if (!capability) {
      throw new DomainError('InvalidRequest', 'tool cannot be nil');
    }
    if (capability.name !== name) {
      throw new DomainError(
        'InvalidRequest',
        `tool name mismatch: registered as '${name}' but tool reports name '${capability.name}'`
      );
    }

    if (this.capabilities.has(name)) {
      this.logger.warn({ toolName: name }, 'Tool already registered, replacing');
    }

    this.capabilities.set(name, capability);
    this.logger.info({ toolName: name }, 'Tool registered');
  }

  async execute(ctx: CallContext, name: string, args: Record<string, unknown>): Promise<ExecutionOutcome> {
    const capability = this.capabilities.get(name);
    if (!capability) {
      this.logger.error({ toolName: name }, 'Tool not found');
      return {
        result: { content: `Tool '${name}' not found`, isError: true },
        error: new DomainError('ToolNotFound', `tool '${name}' not found`)
      };
    }

    const callCtx = ensureDeadline(ctx, this.defaultTimeoutMs);
    this.logger.info({ toolName: name, argsCount: Object.keys(args).length }, 'Executing tool');

    let outcome: ExecutionOutcome;
    try {
      outcome = await capability.execute(callCtx, args);
    } catch (error) {
      outcome = { result: { content: errorMessage(error), isError: true }, error: toError(error) };
    }

    if (outcome.error) {
      const cause = outcome.error;
      this.logger.error({ toolName: name, err: cause.message }, 'Tool execution failed');
      return {
        result: {
          content: `Tool execution failed: ${cause.message}`,
          isError: true,
          metadata: {
            error_type: 'execution_error',
            ...outcome.result.metadata,
            tool_name: name
          }
        },
        error: new DomainError('ToolExecution', `tool execution failed: ${cause.message}`, { cause })
      };
    }

    this.logger.info(
      {
        toolName: name,
        resultError: outcome.result.isError,
        contentLength: outcome.result.content.length,
        citationsCount: outcome.result.citations?.length ?? 0
      },
      'Tool execution completed'
    );
    return outcome;
  }

  list(): ToolInfo[] {
    const tools = [...this.capabilities.values()].map((capability) => ({
      name: capability.name,
      description: capability.description,
      inputSchema: capability.inputSchema
    }));
    this.logger.debug({ count: tools.length }, 'Listed tools');
    return tools;
  }

  /**
   * Boot-time check that every required capability is registered.
   */
  start(): void {
    for (const toolName of this.requiredTools) {
      if (!this.capabilities.has(toolName)) {
        throw new DomainError('Configuration', `required tool '${toolName}' not registered`);
      }
    }
    this.logger.info({ toolsCount: this.capabilities.size, requiredTools: this.requiredTools }, 'Tool registry ready');
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  get size(): number {
    return this.capabilities.size;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
