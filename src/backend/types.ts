/**
 * Shared types for the backend connection layer.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ServerConfig } from "../config/types";

export type { CallToolResult };

export interface ToolInfo {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

/** A live connection to one backend server. */
export interface BackendHandle {
  readonly name: string;
  /** False once the underlying transport has closed. */
  readonly connected: boolean;
  /** Native tools the backend advertised during start-up. */
  getTools(): ToolInfo[];
  callTool(
    toolId: string,
    args: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<CallToolResult>;
  close(): Promise<void>;
}

/**
 * Establishes backend transports and forwards tool calls over them.
 * `call` never retries: a tool call may have side effects.
 */
export interface BackendConnector {
  start(name: string, config: ServerConfig): Promise<BackendHandle>;
  call(
    handle: BackendHandle,
    toolId: string,
    args: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<CallToolResult>;
}
