/**
 * Wire the dispatch engine together from a resolved configuration.
 */

import { McpConnector } from "../backend/connector";
import type { BackendConnector } from "../backend/types";
import type { ResolvedConfig } from "../config/types";
import type { HierarchyStore } from "../hierarchy/store";
import { ServerRegistry } from "../registry/server-registry";
import { warn } from "../util/logger";
import { Dispatcher } from "./dispatcher";
import type { GatewayContext } from "./meta-tools";
import { PatternPolicy } from "./policy";

export interface Gateway {
  dispatcher: Dispatcher;
  registry: ServerRegistry;
  context: GatewayContext;
  shutdown(): Promise<void>;
}

export interface CreateGatewayOptions {
  connector?: BackendConnector;
  /** Overrides `gateway.callTimeoutMs` from the config. */
  callTimeoutMs?: number;
}

export function createGateway(
  config: ResolvedConfig,
  store: HierarchyStore,
  options: CreateGatewayOptions = {},
): Gateway {
  const connector = options.connector ?? new McpConnector();
  const registry = new ServerRegistry(connector, config.servers, {
    retry: config.gateway.retry,
    connectTimeoutMs: config.gateway.connectTimeoutMs,
  });
  const dispatcher = new Dispatcher(store, registry, connector, {
    callTimeoutMs: options.callTimeoutMs ?? config.gateway.callTimeoutMs,
  });

  for (const name of dispatcher.unconfiguredServers()) {
    warn(`Hierarchy references backend "${name}" but no server by that name is configured`);
  }

  const context: GatewayContext = {
    dispatcher,
    policy: config.permissions ? new PatternPolicy(config.permissions) : undefined,
    overview: store.overview || undefined,
  };

  return {
    dispatcher,
    registry,
    context,
    shutdown: () => registry.shutdown(),
  };
}
