export const LATEST_PROTOCOL_VERSION = '2025-06-18';

export const SUPPORTED_PROTOCOL_VERSIONS = [
  '2025-06-18',
  '2025-03-26',
  '2024-11-05'
] as const;

export const DEFAULT_CALL_TIMEOUT_MS = 30_000;

export const SEARCH_TOOL_NAME = 'perplexity_search';

export const REQUIRED_TOOLS: readonly string[] = [SEARCH_TOOL_NAME];

export const SUPPORTED_METHODS = [
  'initialize',
  'ping',
  'notifications/initialized',
  'tools/list',
  'tools/call'
] as const;
