/**
 * BackendConnector over the MCP SDK client transports (stdio, Streamable
 * HTTP, SSE). Classifies call failures into the gateway's error taxonomy.
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { ServerConfig } from "../config/types";
import { BackendError, GatewayError, TimeoutError } from "../gateway/errors";
import type { BackendConnector, BackendHandle, CallToolResult } from "./types";
import { UpstreamClient } from "./upstream-client";

export class McpConnector implements BackendConnector {
  async start(name: string, config: ServerConfig): Promise<BackendHandle> {
    const client = new UpstreamClient(name, config);
    await client.connect();
    return client;
  }

  async call(
    handle: BackendHandle,
    toolId: string,
    args: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<CallToolResult> {
    try {
      return await handle.callTool(toolId, args, timeoutMs);
    } catch (err) {
      if (err instanceof GatewayError) throw err;
      if (err instanceof McpError && err.code === ErrorCode.RequestTimeout) {
        throw new TimeoutError(`${handle.name}/${toolId}`, timeoutMs);
      }
      throw new BackendError(handle.name, toolId, err);
    }
  }
}
