import http from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Dispatcher } from "../../src/gateway/dispatcher.js";
import type { GatewayContext } from "../../src/gateway/meta-tools.js";
import { ServerRegistry } from "../../src/registry/server-registry.js";
import { startHttpServer } from "../../src/transport/http-server.js";
import { FakeConnector } from "../helpers/fake-connector.js";
import { sampleStore } from "../helpers/hierarchy.js";

function makeGateway(): { context: GatewayContext; registry: ServerRegistry; } {
  const connector = new FakeConnector();
  const registry = new ServerRegistry(connector, { github: { command: "github-mcp" } });
  return {
    context: { dispatcher: new Dispatcher(sampleStore(), registry, connector) },
    registry,
  };
}

describe("startHttpServer", () => {
  let closeServer: () => Promise<void>;
  let baseUrl: string;
  let registry: ServerRegistry;

  async function start(options: { apiKey?: string; } = {}): Promise<void> {
    const gateway = makeGateway();
    registry = gateway.registry;
    const server = await startHttpServer(gateway.context, gateway.registry, {
      port: 0,
      ...options,
    });
    closeServer = server.close;
    baseUrl = `http://localhost:${server.port}`;
  }

  afterEach(async () => {
    await closeServer();
  });

  describe("without an API key", () => {
    beforeEach(async () => {
      await start();
    });

    it("binds an ephemeral port", () => {
      expect(baseUrl).toMatch(/^http:\/\/localhost:\d+$/);
      expect(baseUrl).not.toBe("http://localhost:0");
    });

    it("reports backend status on /health", async () => {
      const release = await registry.getClientMutex("github").acquire();
      await registry.getOrCreateConnection("github");
      release();

      const res = await fetch(`${baseUrl}/health`);
      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({
        status: "ok",
        backends: [{ name: "github", state: "Ready", failureCount: 0 }],
      });
    });

    it("returns 404 for unknown paths", async () => {
      const res = await fetch(`${baseUrl}/unknown`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Not found" });
    });

    it("returns 405 for unsupported methods on /mcp", async () => {
      const res = await fetch(`${baseUrl}/mcp`, { method: "PUT" });
      expect(res.status).toBe(405);
      expect(await res.json()).toEqual({ error: "Method not allowed" });
    });

    it("rejects GET /mcp without a session", async () => {
      const res = await fetch(`${baseUrl}/mcp`);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "No session. Send POST /mcp first." });
    });

    it("accepts DELETE /mcp for unknown sessions", async () => {
      const res = await fetch(`${baseUrl}/mcp`, {
        method: "DELETE",
        headers: { "mcp-session-id": "missing" },
      });
      expect(res.status).toBe(200);
    });
  });

  describe("with an API key", () => {
    beforeEach(async () => {
      await start({ apiKey: "test-key" });
    });

    it("rejects requests without the key", async () => {
      const res = await fetch(`${baseUrl}/mcp`, { method: "PUT" });
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "Unauthorized" });
    });

    it("rejects requests with the wrong key", async () => {
      const res = await fetch(`${baseUrl}/mcp`, {
        method: "PUT",
        headers: { "x-api-key": "nope" },
      });
      expect(res.status).toBe(401);
    });

    it("lets requests with the key through", async () => {
      const res = await fetch(`${baseUrl}/mcp`, {
        method: "PUT",
        headers: { "x-api-key": "test-key" },
      });
      expect(res.status).toBe(405);
    });

    it("leaves /health open", async () => {
      const res = await fetch(`${baseUrl}/health`);
      expect(res.status).toBe(200);
    });
  });
});

describe("HTTP server port-in-use", () => {
  let blockingServer: http.Server;
  let blockingPort: number;

  beforeEach(async () => {
    blockingServer = http.createServer((_req, res) => {
      res.writeHead(200);
      res.end();
    });
    await new Promise<void>(resolve => {
      blockingServer.listen(0, () => resolve());
    });
    const addr = blockingServer.address();
    blockingPort = typeof addr === "object" && addr !== null ? addr.port : 0;
  });

  afterEach(async () => {
    await new Promise<void>(resolve => blockingServer.close(() => resolve()));
  });

  it("rejects with error when the port is in use", async () => {
    const gateway = makeGateway();
    await expect(
      startHttpServer(gateway.context, gateway.registry, { port: blockingPort }),
    ).rejects.toThrow(/EADDRINUSE/);
  });
});
