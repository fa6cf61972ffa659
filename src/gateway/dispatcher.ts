/**
 * The two meta operations: browse the hierarchy, execute a tool by path.
 */

import type { BackendConnector, CallToolResult } from "../backend/types";
import type { CategoryListing, HierarchyStore } from "../hierarchy/store";
import type { ServerRegistry } from "../registry/server-registry";
import { log, warn } from "../util/logger";

export const DEFAULT_CALL_TIMEOUT_MS = 60_000;

export interface DispatcherOptions {
  callTimeoutMs?: number;
}

export class Dispatcher {
  private store: HierarchyStore;
  private registry: ServerRegistry;
  private connector: BackendConnector;
  private callTimeoutMs: number;

  constructor(
    store: HierarchyStore,
    registry: ServerRegistry,
    connector: BackendConnector,
    options: DispatcherOptions = {},
  ) {
    this.store = store;
    this.registry = registry;
    this.connector = connector;
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
  }

  getToolsInCategory(path: string): CategoryListing {
    return this.store.listChildren(path);
  }

  /**
   * Resolve `toolPath` and forward the call to its backend. Resolution errors
   * are raised before any backend is touched. The backend's mutex is held
   * from connection lookup through the end of the call and released on every
   * exit path; the call itself is never retried.
   */
  async executeTool(
    toolPath: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult> {
    const tool = this.store.resolveTool(toolPath);
    const { serverName, toolId } = tool;

    const release = await this.registry.getClientMutex(serverName).acquire();
    try {
      const handle = await this.registry.getOrCreateConnection(serverName);

      const advertised = handle.getTools();
      if (advertised.length > 0 && !advertised.some(t => t.name === toolId)) {
        warn(`${serverName} does not advertise "${toolId}" (from ${toolPath}); forwarding anyway`);
      }

      log(`Dispatching ${toolPath} → ${serverName}/${toolId}`);
      const result = await this.connector.call(handle, toolId, args, this.callTimeoutMs);
      this.registry.touch(serverName);
      return result;
    } finally {
      release();
    }
  }

  /** Backend names the hierarchy references but the configuration lacks. */
  unconfiguredServers(): string[] {
    return this.store.servers().filter(name => !this.registry.hasConfig(name));
  }
}
