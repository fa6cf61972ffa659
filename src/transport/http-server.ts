/**
 * HTTP transport for the gateway.
 * Uses Node.js built-in http module with MCP SDK's StreamableHTTPServerTransport.
 */

import { randomUUID, timingSafeEqual } from "node:crypto";
import {
  createServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createGatewayServer } from "../gateway/gateway-server";
import type { GatewayContext } from "../gateway/meta-tools";
import type { ServerRegistry } from "../registry/server-registry";
import { error as logError, warn } from "../util/logger";

export interface HttpServerOptions {
  port: number;
  apiKey?: string;
}

export interface RunningHttpServer {
  /** Port actually bound (differs from the requested one when it was 0). */
  port: number;
  close: () => Promise<void>;
}

function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export async function startHttpServer(
  context: GatewayContext,
  registry: ServerRegistry,
  options: HttpServerOptions,
): Promise<RunningHttpServer> {
  // Map to store transports by session ID
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const handle = async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(
      req.url ?? "/",
      `http://${req.headers.host ?? "localhost"}`,
    );

    if (url.pathname === "/health" && req.method === "GET") {
      sendJson(res, 200, { status: "ok", backends: registry.status() });
      return;
    }

    if (url.pathname !== "/mcp") {
      sendJson(res, 404, { error: "Not found" });
      return;
    }

    if (options.apiKey) {
      const provided = req.headers["x-api-key"];
      if (typeof provided !== "string" || !safeCompare(provided, options.apiKey)) {
        sendJson(res, 401, { error: "Unauthorized" });
        return;
      }
    }

    const header = req.headers["mcp-session-id"];
    const sessionId = typeof header === "string" ? header : undefined;
    const existing = sessionId ? transports.get(sessionId) : undefined;

    if (req.method === "POST") {
      if (existing) {
        await existing.handleRequest(req, res);
        return;
      }

      const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: id => {
          transports.set(id, transport);
        },
      });
      transport.onclose = () => {
        if (transport.sessionId) {
          transports.delete(transport.sessionId);
        }
      };

      const server = createGatewayServer(context);
      await server.connect(transport);
      await transport.handleRequest(req, res);
    } else if (req.method === "GET") {
      if (!existing) {
        sendJson(res, 400, { error: "No session. Send POST /mcp first." });
        return;
      }
      await existing.handleRequest(req, res);
    } else if (req.method === "DELETE") {
      if (existing && sessionId) {
        await existing.close();
        transports.delete(sessionId);
      }
      res.writeHead(200);
      res.end();
    } else {
      sendJson(res, 405, { error: "Method not allowed" });
    }
  };

  const httpServer = createServer((req, res) => {
    handle(req, res).catch(err => {
      logError(
        `HTTP request failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal server error" });
      }
    });
  });

  return new Promise((resolve, reject) => {
    httpServer.on("error", reject);
    httpServer.listen(options.port, () => {
      const address = httpServer.address();
      const port = typeof address === "object" && address !== null
        ? address.port
        : options.port;
      warn(`Gateway listening on http://localhost:${port}/mcp`);
      resolve({
        port,
        close: async () => {
          for (const transport of transports.values()) {
            await transport.close();
          }
          transports.clear();
          return new Promise<void>(res => httpServer.close(() => res()));
        },
      });
    });
  });
}
