/**
 * MCP server exposing the two meta tools over stdio.
 * Uses the low-level Server API so the tool list stays fixed and tiny.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { type GatewayContext, registerGatewayHandlers } from "./meta-tools";
import { log } from "../util/logger";

export const SERVER_INFO = { name: "toolpath-gateway", version: "0.1.0" };

export function createGatewayServer(context: GatewayContext): Server {
  const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });
  registerGatewayHandlers(server, context);
  return server;
}

export class GatewayServer {
  private server: Server;

  constructor(context: GatewayContext) {
    this.server = createGatewayServer(context);
  }

  async serve(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    log("GatewayServer listening on stdio");
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}
