// pattern: Functional Core (barrel export)

export type { AppConfig, ServerConfig, AuthConfig, ToolsConfig } from './schema.ts';
export { AppConfigSchema } from './schema.ts';
export type { ServerOverrides } from './config.ts';
export { loadConfig } from './config.ts';
