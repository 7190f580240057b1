import type { Logger } from 'pino';
import { errorMessage, isDomainError } from '../domain/errors.js';
import {
  DATE_RANGES,
  DEFAULT_MODEL,
  MAX_QUERY_LENGTH,
  MAX_SOURCES_COUNT,
  MAX_TOKENS_LIMIT,
  SEARCH_MODES,
  SONAR_MODELS,
  type SearchBackend,
  type SearchResult
} from '../domain/search.js';
import { validateSearchRequest } from '../domain/validator.js';
import type { Capability, ExecutionOutcome } from '../mcp/capability.js';
import { SEARCH_TOOL_NAME } from '../mcp/protocol-constants.js';
import type { ToolInputSchema } from '../mcp/protocol.js';
import type { CallContext } from '../util/context.js';

export const searchInputSchema: ToolInputSchema = {
  type: 'object',
  properties: {
    query: {
      type: 'string',
      description: 'The search query to execute',
      minLength: 1,
      maxLength: MAX_QUERY_LENGTH
    },
    model: {
      type: 'string',
      description: `The Sonar model to use for search (optional, defaults to '${DEFAULT_MODEL}')`,
      enum: [...SONAR_MODELS],
      default: DEFAULT_MODEL
    },
    search_mode: {
      type: 'string',
      description: "The search mode to use (optional, defaults to 'web')",
      enum: [...SEARCH_MODES],
      default: 'web'
    },
    max_tokens: {
      type: 'number',
      description: 'Maximum number of tokens in the response (optional)',
      minimum: 1,
      maximum: MAX_TOKENS_LIMIT
    },
    date_range: {
      type: 'string',
      description: 'Filter search results by date range (optional)',
      enum: [...DATE_RANGES]
    },
    sources: {
      type: 'array',
      description: `Limit search to specific domains (optional, max ${MAX_SOURCES_COUNT})`,
      items: { type: 'string' },
      maxItems: MAX_SOURCES_COUNT
    },
    options: {
      type: 'object',
      description: 'Additional search options: temperature, top_p, disable_search, search_domain_filter, search_mode',
      additionalProperties: { type: 'string' }
    }
  },
  required: ['query'],
  additionalProperties: false
};

export class SearchTool implements Capability {
  readonly name = SEARCH_TOOL_NAME;
  readonly description =
    'Search for information using Perplexity AI Sonar models. Provides real-time web search with citations and sources, supporting academic search, news search, and domain filtering.';
  readonly inputSchema = searchInputSchema;

  constructor(
    private readonly backend: SearchBackend,
    private readonly logger: Logger
  ) {}

  async execute(ctx: CallContext, args: Record<string, unknown>): Promise<ExecutionOutcome> {
    const validation = validateSearchRequest(args);
    if (!validation.ok) {
      this.logger.warn({ err: validation.error.message }, 'Rejected search request');
      return {
        result: {
          content: `Invalid search request: ${validation.error.message}`,
          isError: true,
          metadata: { error_type: 'validation_error' }
        },
        error: validation.error
      };
    }

    const { request } = validation;
    let result: SearchResult;
    try {
      result = await this.backend.search(ctx, request);
    } catch (error) {
      this.logger.error({ err: errorMessage(error), model: request.model }, 'Search execution failed');
      return {
        result: {
          content: `Search failed: ${errorMessage(error)}`,
          isError: true,
          metadata: {
            error_type: 'execution_error',
            error_kind: isDomainError(error) ? error.kind : 'Unknown',
            model: request.model ?? null
          }
        },
        error: error instanceof Error ? error : new Error(String(error))
      };
    }

    this.logger.info(
      {
        resultId: result.id,
        contentLength: result.content.length,
        citationsCount: result.citations.length,
        sourcesCount: result.sources.length
      },
      'Search completed'
    );

    return {
      result: {
        content: formatSearchResult(result),
        isError: false,
        citations: result.citations,
        metadata: {
          result_id: result.id,
          model: result.model,
          usage: result.usage,
          created: result.created.toISOString(),
          sources_count: result.sources.length,
          citations_count: result.citations.length
        }
      }
    };
  }
}

export function formatSearchResult(result: SearchResult): string {
  return JSON.stringify(
    {
      id: result.id,
      content: result.content,
      model: result.model,
      usage: result.usage,
      created: result.created.toISOString(),
      ...(result.citations.length > 0 ? { citations: result.citations } : {}),
      ...(result.sources.length > 0 ? { sources: result.sources } : {})
    },
    null,
    2
  );
}
