/**
 * Configuration types for backend servers and gateway settings.
 * Backend entries follow the `.mcp.json` `mcpServers` format.
 */

export interface StdioServerConfig {
  type?: "stdio";
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface HttpServerConfig {
  type: "sse" | "url";
  url: string;
  env?: Record<string, string>;
}

export type ServerConfig = StdioServerConfig | HttpServerConfig;

export interface RetryConfig {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

export interface GatewaySettings {
  callTimeoutMs?: number;
  connectTimeoutMs?: number;
  retry?: RetryConfig;
}

export interface PermissionsConfig {
  /** Tool path patterns that are always refused. */
  denied?: string[];
  /** Tool path patterns that need confirmation before running. */
  sensitive?: string[];
  /**
   * Command run to confirm a sensitive call; exit 0 allows it. Split on
   * whitespace into program and arguments and run without a shell.
   */
  confirmationHook?: string;
  /** Seconds to wait for the confirmation hook. */
  confirmationTimeout?: number;
}

export interface GatewayConfigFile {
  mcpServers: Record<string, ServerConfig>;
  hierarchy?: string;
  gateway?: GatewaySettings;
  permissions?: PermissionsConfig;
}

export interface ResolvedConfig {
  servers: Record<string, ServerConfig>;
  /** Absolute path of the hierarchy file, when one was configured. */
  hierarchyPath?: string;
  gateway: GatewaySettings;
  permissions?: PermissionsConfig;
  /** Config file paths that were successfully loaded (for diagnostics). */
  configSources?: string[];
}

export function isStdioConfig(
  config: ServerConfig,
): config is StdioServerConfig {
  return config.type === "stdio" || config.type === undefined;
}

export function isHttpConfig(config: ServerConfig): config is HttpServerConfig {
  return config.type === "sse" || config.type === "url";
}
