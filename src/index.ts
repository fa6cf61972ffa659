/**
 * Programmatic API for the toolpath gateway.
 */

export { HierarchyStore, describeTool, PATH_SEPARATOR } from "./hierarchy/store";
export type {
  CategoryListing,
  CategoryNode,
  HierarchyNode,
  ToolNode,
} from "./hierarchy/store";
export { HierarchyLoadError, loadHierarchy, parseHierarchy } from "./hierarchy/loader";
export type { HierarchyDefinition, NodeDefinition } from "./hierarchy/schema";
export { ServerRegistry } from "./registry/server-registry";
export type {
  ConnectionState,
  ServerRegistryOptions,
  ServerStatus,
} from "./registry/server-registry";
export { Mutex } from "./registry/mutex";
export { calculateBackoff } from "./registry/backoff";
export { McpConnector } from "./backend/connector";
export { UpstreamClient } from "./backend/upstream-client";
export type {
  BackendConnector,
  BackendHandle,
  CallToolResult,
  ToolInfo,
} from "./backend/types";
export { Dispatcher } from "./gateway/dispatcher";
export type { DispatcherOptions } from "./gateway/dispatcher";
export { createGateway } from "./gateway/create-gateway";
export type { CreateGatewayOptions, Gateway } from "./gateway/create-gateway";
export { createGatewayServer, GatewayServer } from "./gateway/gateway-server";
export {
  EXECUTE_TOOL,
  GET_TOOLS_IN_CATEGORY,
  getMetaTools,
  handleMetaToolCall,
} from "./gateway/meta-tools";
export type { GatewayContext } from "./gateway/meta-tools";
export { PatternPolicy, runConfirmationHook } from "./gateway/policy";
export type { ExecutionPolicy, PolicyDecision, PolicyVerdict } from "./gateway/policy";
export * from "./gateway/errors";
export { ConfigError, discoverConfig, type DiscoveryOptions } from "./config/discovery";
export { validateConfig } from "./config/schema";
export type {
  GatewayConfigFile,
  HttpServerConfig,
  PermissionsConfig,
  ResolvedConfig,
  ServerConfig,
  StdioServerConfig,
} from "./config/types";
export { startHttpServer } from "./transport/http-server";
export { setVerbose } from "./util/logger";
