import type { Citation } from '../domain/search.js';
import type { CallContext } from '../util/context.js';
import type { ToolDefinition } from './protocol.js';

export interface ToolResult {
  content: string;
  isError: boolean;
  metadata?: Record<string, unknown>;
  citations?: Citation[];
}

/**
 * A call produces a result for the protocol layer and, on failure, the error
 * itself for callers that only care whether it worked.
 */
export interface ExecutionOutcome {
  result: ToolResult;
  error?: Error;
}

export type ToolInfo = ToolDefinition;

export interface Capability extends ToolInfo {
  execute(ctx: CallContext, args: Record<string, unknown>): Promise<ExecutionOutcome>;
}
