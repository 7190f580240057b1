import type { CallContext } from '../util/context.js';

export const SONAR_MODELS = [
  'sonar',
  'sonar-pro',
  'sonar-reasoning',
  'sonar-reasoning-pro',
  'sonar-deep-research'
] as const;

export const SEARCH_MODES = ['web', 'academic', 'news'] as const;

export const DATE_RANGES = ['day', 'week', 'month', 'year'] as const;

export type SonarModel = (typeof SONAR_MODELS)[number];
export type SearchMode = (typeof SEARCH_MODES)[number];
export type DateRange = (typeof DATE_RANGES)[number];

export const DEFAULT_MODEL: SonarModel = 'sonar';

export const MAX_QUERY_LENGTH = 10_000;
export const MAX_TOKENS_LIMIT = 128_000;
export const MAX_SOURCES_COUNT = 10;
export const MAX_OPTIONS_COUNT = 20;
export const MAX_OPTION_KEY_LENGTH = 100;
export const MAX_OPTION_VALUE_LENGTH = 1_000;

export interface SearchRequest {
  readonly query: string;
  readonly model?: SonarModel;
  readonly searchMode?: SearchMode;
  readonly dateRange?: DateRange;
  readonly maxTokens?: number;
  readonly sources: readonly string[];
  readonly options: Readonly<Record<string, string>>;
}

export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface Citation {
  number: number;
  url: string;
  title: string;
}

export interface Source {
  url: string;
  title: string;
  snippet: string;
}

export interface SearchResult {
  id: string;
  content: string;
  model: string;
  usage: Usage;
  citations: Citation[];
  sources: Source[];
  created: Date;
}

export interface SearchBackend {
  search(ctx: CallContext, request: SearchRequest): Promise<SearchResult>;
}

export function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}
