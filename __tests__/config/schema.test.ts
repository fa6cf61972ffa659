import { describe, expect, it } from "vitest";
import { validateConfig } from "../../src/config/schema.js";

describe("validateConfig", () => {
  it("validates a stdio server config", () => {
    const result = validateConfig({
      mcpServers: {
        serena: {
          command: "uvx",
          args: ["serena-mcp"],
        },
      },
    });
    expect(result.mcpServers.serena).toEqual({
      command: "uvx",
      args: ["serena-mcp"],
    });
  });

  it("validates a stdio server with explicit type", () => {
    const result = validateConfig({
      mcpServers: {
        test: {
          type: "stdio",
          command: "node",
          args: ["server.js"],
          env: { FOO: "bar" },
        },
      },
    });
    expect(result.mcpServers.test).toEqual({
      type: "stdio",
      command: "node",
      args: ["server.js"],
      env: { FOO: "bar" },
    });
  });

  it("validates an SSE server config", () => {
    const result = validateConfig({
      mcpServers: {
        remote: {
          type: "sse",
          url: "http://localhost:3000/api/mcp",
        },
      },
    });
    expect(result.mcpServers.remote).toEqual({
      type: "sse",
      url: "http://localhost:3000/api/mcp",
    });
  });

  it("validates a URL server config", () => {
    const result = validateConfig({
      mcpServers: {
        remote: {
          type: "url",
          url: "https://example.com/mcp",
        },
      },
    });
    expect(result.mcpServers.remote).toEqual({
      type: "url",
      url: "https://example.com/mcp",
    });
  });

  it("validates multiple servers", () => {
    const result = validateConfig({
      mcpServers: {
        a: { command: "node", args: ["a.js"] },
        b: { type: "url", url: "https://b.example.com/mcp" },
      },
    });
    expect(Object.keys(result.mcpServers)).toEqual(["a", "b"]);
  });

  it("rejects missing command in stdio config", () => {
    expect(() =>
      validateConfig({
        mcpServers: {
          bad: { args: ["test"] },
        },
      })
    ).toThrow();
  });

  it("rejects invalid URL in http config", () => {
    expect(() =>
      validateConfig({
        mcpServers: {
          bad: { type: "url", url: "not-a-url" },
        },
      })
    ).toThrow();
  });

  it("rejects missing mcpServers key", () => {
    expect(() => validateConfig({})).toThrow();
  });

  it("validates empty server list", () => {
    const result = validateConfig({ mcpServers: {} });
    expect(result.mcpServers).toEqual({});
  });

  it("accepts hierarchy, gateway and permissions sections", () => {
    const result = validateConfig({
      mcpServers: {},
      hierarchy: "./hierarchy.json",
      gateway: {
        callTimeoutMs: 30000,
        connectTimeoutMs: 10000,
        retry: { maxAttempts: 3, initialDelayMs: 500, maxDelayMs: 8000 },
      },
      permissions: {
        denied: ["gmail.*"],
        sensitive: ["*.delete_*"],
        confirmationHook: "./hooks/confirm.sh",
        confirmationTimeout: 15,
      },
    });
    expect(result.gateway?.retry).toEqual({
      maxAttempts: 3,
      initialDelayMs: 500,
      maxDelayMs: 8000,
    });
    expect(result.permissions?.denied).toEqual(["gmail.*"]);
  });

  it("rejects a non-positive call timeout", () => {
    expect(() =>
      validateConfig({ mcpServers: {}, gateway: { callTimeoutMs: 0 } })
    ).toThrow();
  });

  it("accepts timeouts up to the timer limit", () => {
    const result = validateConfig({
      mcpServers: {},
      gateway: { callTimeoutMs: 2_147_483_647, connectTimeoutMs: 2_147_483_647 },
      permissions: { confirmationTimeout: 2_147_483 },
    });
    expect(result.gateway?.callTimeoutMs).toBe(2_147_483_647);
    expect(result.permissions?.confirmationTimeout).toBe(2_147_483);
  });

  it.each([
    { gateway: { callTimeoutMs: 3_000_000_000 } },
    { gateway: { connectTimeoutMs: 2_147_483_648 } },
    { permissions: { confirmationTimeout: 2_147_484 } },
  ])("rejects timeouts a timer cannot hold: %j", section => {
    expect(() => validateConfig({ mcpServers: {}, ...section })).toThrow();
  });

  it("rejects a zero retry budget", () => {
    expect(() =>
      validateConfig({ mcpServers: {}, gateway: { retry: { maxAttempts: 0 } } })
    ).toThrow();
  });
});
