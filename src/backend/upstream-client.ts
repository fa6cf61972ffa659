/**
 * Wraps the MCP SDK Client for a single backend server.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ServerConfig } from "../config/types";
import { isHttpConfig, isStdioConfig } from "../config/types";
import { TimeoutError } from "../gateway/errors";
import { withTimeout } from "../util/timeout";
import type { BackendHandle, CallToolResult, ToolInfo } from "./types";
import { log, warn } from "../util/logger";

export const CLIENT_VERSION = "0.1.0";

/** Variables a stdio backend inherits even when its config sets `env`. */
const INHERITED_ENV_KEYS = ["PATH", "HOME", "NODE_ENV"] as const;

function buildChildEnv(
  env: Record<string, string>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const key of INHERITED_ENV_KEYS) {
    const value = process.env[key];
    if (value !== undefined) result[key] = value;
  }
  return { ...result, ...env };
}

export class UpstreamClient implements BackendHandle {
  readonly name: string;
  private client: Client;
  private config: ServerConfig;
  private tools: ToolInfo[] = [];
  private _connected = false;

  constructor(name: string, config: ServerConfig) {
    this.name = name;
    this.config = config;
    this.client = new Client(
      { name: `toolpath-${name}`, version: CLIENT_VERSION },
      { capabilities: {} },
    );
    this.client.onclose = () => {
      if (this._connected) {
        warn(`${this.name}: transport closed`);
      }
      this._connected = false;
    };
  }

  async connect(): Promise<void> {
    log(`Connecting to backend: ${this.name}`);

    try {
      const transport = this.createTransport();
      await this.client.connect(transport);
      this._connected = true;

      const result = await this.client.listTools();
      this.tools = result.tools.map(t => ({
        name: t.name,
        description: t.description,
        inputSchema: t.inputSchema,
      }));

      if (this.tools.length === 0) {
        warn(`${this.name}: connected but discovered 0 tools`);
      }

      log(`Connected to ${this.name}: ${this.tools.length} tools`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      warn(`Failed to connect to ${this.name}: ${message}`);
      if (
        isHttpConfig(this.config)
        && (message.includes("401") || message.includes("403")
          || message.includes("Unauthorized"))
      ) {
        warn(`${this.name}: auth failure, verify AUTH_TOKEN in the server's env`);
      }
      await this.close();
      throw err;
    }
  }

  private createTransport():
    | StdioClientTransport
    | StreamableHTTPClientTransport
    | SSEClientTransport
  {
    if (isStdioConfig(this.config)) {
      return new StdioClientTransport({
        command: this.config.command,
        args: this.config.args,
        env: this.config.env ? buildChildEnv(this.config.env) : undefined,
        cwd: this.config.cwd,
      });
    }

    const url = new URL(this.config.url);
    const authToken = this.config.env?.AUTH_TOKEN;
    const requestInit = authToken
      ? { headers: { Authorization: `Bearer ${authToken}` } }
      : undefined;

    if (this.config.type === "sse") {
      return new SSEClientTransport(url, { requestInit });
    }

    return new StreamableHTTPClientTransport(url, { requestInit });
  }

  getTools(): ToolInfo[] {
    return this.tools;
  }

  get connected(): boolean {
    return this._connected;
  }

  /**
   * Forward one tools/call. When the deadline passes the request is aborted,
   * which makes the SDK send a cancellation notification to the backend.
   */
  async callTool(
    toolId: string,
    args: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<CallToolResult> {
    if (!this._connected) {
      throw new Error(`Backend ${this.name} is not connected`);
    }

    log(`Calling ${this.name}/${toolId}`);
    const controller = new AbortController();
    const result = await withTimeout(
      this.client.callTool(
        { name: toolId, arguments: args },
        undefined,
        { signal: controller.signal, timeout: timeoutMs },
      ),
      timeoutMs,
      () => {
        controller.abort();
        return new TimeoutError(`${this.name}/${toolId}`, timeoutMs);
      },
    );
    return CallToolResultSchema.parse(result);
  }

  async close(): Promise<void> {
    this._connected = false;
    try {
      await this.client.close();
      log(`Closed backend: ${this.name}`);
    } catch (err) {
      warn(
        `Error closing ${this.name}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
