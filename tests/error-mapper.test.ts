import { describe, expect, it } from 'vitest';
import { DomainError } from '../src/domain/errors.js';
import { ErrorCode, McpError, toJsonRpcError } from '../src/mcp/error-mapper.js';

describe('toJsonRpcError', () => {
  it('forwards protocol errors unchanged', () => {
    expect(toJsonRpcError(new McpError(ErrorCode.InvalidParams, 'Invalid params', 'tool name is required'))).toEqual({
      code: -32602,
      message: 'Invalid params',
      data: 'tool name is required'
    });
  });

  it('omits data when a protocol error has none', () => {
    expect(toJsonRpcError(new McpError(ErrorCode.MethodNotFound, 'Method not found: x'))).toEqual({
      code: -32601,
      message: 'Method not found: x'
    });
  });

  it('maps domain errors to a server error', () => {
    expect(toJsonRpcError(new DomainError('ToolNotFound', "tool 'x' not found"))).toEqual({
      code: -32000,
      message: 'Server error',
      data: "tool 'x' not found"
    });
  });

  it('maps non-error values', () => {
    expect(toJsonRpcError('boom')).toEqual({ code: -32000, message: 'Server error', data: 'boom' });
  });
});
