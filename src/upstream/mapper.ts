import type { Logger } from 'pino';
import { DomainError } from '../domain/errors.js';
import {
  MAX_OPTION_KEY_LENGTH,
  MAX_OPTION_VALUE_LENGTH,
  MAX_SOURCES_COUNT,
  SEARCH_MODES,
  isOneOf,
  type Citation,
  type SearchRequest,
  type SearchResult,
  type SonarModel,
  type Source
} from '../domain/search.js';
import type { ChatCompletionRequest, ChatCompletionResponse } from './wire.js';

const MAX_DOMAIN_LENGTH = 253;
// 10 domains of 253 chars plus separators
const MAX_DOMAIN_FILTER_LENGTH = 3000;

const TRUE_LITERALS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_LITERALS = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

export function toChatCompletionRequest(
  request: SearchRequest & { model: SonarModel },
  logger: Logger
): ChatCompletionRequest {
  const body: ChatCompletionRequest = {
    model: request.model,
    messages: [{ role: 'user', content: request.query }],
    stream: false
  };

  if (request.maxTokens && request.maxTokens > 0) body.max_tokens = request.maxTokens;
  if (request.searchMode) body.search_mode = request.searchMode;
  if (request.dateRange) body.search_recency_filter = request.dateRange;
  if (request.sources.length > 0) body.search_domain_filter = [...request.sources];

  applySearchOptions(body, request.options, logger);
  return body;
}

/**
 * Applies free-form options on top of the typed fields. A value that fails its own
 * bound is dropped with a warning; an oversized value or domain filter fails the call.
 */
export function applySearchOptions(
  body: ChatCompletionRequest,
  options: Readonly<Record<string, string>>,
  logger: Logger
): void {
  for (const [key, value] of Object.entries(options)) {
    if (key.length > MAX_OPTION_KEY_LENGTH) {
      logger.warn({ keyLength: key.length, max: MAX_OPTION_KEY_LENGTH }, 'Option key too long, skipping');
      continue;
    }
    if (value.length > MAX_OPTION_VALUE_LENGTH) {
      throw new DomainError(
        'InvalidRequest',
        `option value for key '${key}' is too long: ${value.length} > ${MAX_OPTION_VALUE_LENGTH}`
      );
    }

    switch (key.toLowerCase()) {
      case 'temperature': {
        const temperature = parseNumber(value);
        if (temperature !== null && temperature >= 0 && temperature <= 2) {
          body.temperature = temperature;
        } else {
          logger.warn({ option: 'temperature' }, 'Invalid option value, ignoring');
        }
        break;
      }
      case 'top_p': {
        const topP = parseNumber(value);
        if (topP !== null && topP >= 0 && topP <= 1) {
          body.top_p = topP;
        } else {
          logger.warn({ option: 'top_p' }, 'Invalid option value, ignoring');
        }
        break;
      }
      case 'disable_search': {
        const disable = parseBoolean(value);
        if (disable !== null) {
          body.disable_search = disable;
        } else {
          logger.warn({ option: 'disable_search' }, 'Invalid option value, ignoring');
        }
        break;
      }
      case 'search_domain_filter': {
        const domains = parseDomainFilter(value, logger);
        if (domains.length > 0) body.search_domain_filter = domains;
        break;
      }
      case 'search_mode':
        if (isOneOf(SEARCH_MODES, value)) {
          body.search_mode = value;
        } else {
          logger.warn({ mode: value, validModes: SEARCH_MODES }, 'Invalid search mode, ignoring');
        }
        break;
      default:
        logger.warn({ key }, 'Unknown search option key, ignoring');
    }
  }
}

export function parseDomainFilter(value: string, logger: Logger): string[] {
  if (value.length > MAX_DOMAIN_FILTER_LENGTH) {
    throw new DomainError(
      'InvalidRequest',
      `search_domain_filter value too long: ${value.length} > ${MAX_DOMAIN_FILTER_LENGTH}`
    );
  }

  const domains: string[] = [];
  for (const raw of value.split(',')) {
    const domain = raw.trim();
    if (!domain) continue;
    if (domain.length > MAX_DOMAIN_LENGTH) {
      logger.warn({ length: domain.length }, 'Domain too long, skipping');
      continue;
    }
    if (domain.includes('/') || domain.includes(' ')) {
      logger.warn({ domain }, 'Invalid domain format, skipping');
      continue;
    }
    domains.push(domain);
  }

  if (domains.length > MAX_SOURCES_COUNT) {
    throw new DomainError(
      'InvalidRequest',
      `too many domains in search_domain_filter: ${domains.length} > ${MAX_SOURCES_COUNT}`
    );
  }
  return domains;
}

export function toSearchResult(response: ChatCompletionResponse): SearchResult {
  const citations: Citation[] = (response.citations ?? []).map((citation, index) =>
    typeof citation === 'string'
      ? { number: index + 1, url: citation, title: '' }
      : { number: citation.number ?? index + 1, url: citation.url, title: citation.title ?? '' }
  );

  const sources: Source[] = (response.sources ?? response.search_results ?? []).map((source) => ({
    url: source.url,
    title: source.title ?? '',
    snippet: source.snippet ?? ''
  }));

  return {
    id: response.id,
    content: response.choices[0]?.message.content ?? '',
    model: response.model,
    usage: {
      promptTokens: response.usage.prompt_tokens,
      completionTokens: response.usage.completion_tokens,
      totalTokens: response.usage.total_tokens
    },
    citations,
    sources,
    created: new Date(response.created * 1000)
  };
}

function parseNumber(value: string): number | null {
  if (value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseBoolean(value: string): boolean | null {
  if (TRUE_LITERALS.has(value)) return true;
  if (FALSE_LITERALS.has(value)) return false;
  return null;
}
