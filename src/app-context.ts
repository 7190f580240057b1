import type { Logger } from 'pino';
import type { AppConfig } from './config/index.js';
import type { McpDispatcher } from './mcp/dispatcher.js';
import type { ToolRegistry } from './mcp/registry.js';

export interface Services {
  registry: ToolRegistry;
  dispatcher: McpDispatcher;
}

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  services: Services;
}
