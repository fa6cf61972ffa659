/**
 * `toolpath serve` command: starts the gateway.
 * Supports stdio (default) and http transports.
 */

import type { Command } from "commander";
import { discoverConfig } from "../config/discovery";
import { createGateway } from "../gateway/create-gateway";
import { GatewayServer } from "../gateway/gateway-server";
import { loadHierarchy } from "../hierarchy/loader";
import { error as logError, log } from "../util/logger";
import { MAX_TIMEOUT_MS } from "../util/timeout";
import {
  collect,
  parseInlineServers,
  parseInlineUrls,
  parsePositiveInt,
} from "./common";

interface ServeOptions {
  config?: string;
  hierarchy?: string;
  server: string[];
  serverUrl: string[];
  transport: string;
  port: string;
  apiKey?: string;
  callTimeout?: string;
}

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Start the gateway MCP server")
    .option("--config <path>", "Path to .mcp.json config file")
    .option("--hierarchy <path>", "Path to the hierarchy JSON file")
    .option(
      "--server <name=command>",
      "Add stdio backend inline (repeatable)",
      collect,
      [],
    )
    .option(
      "--server-url <name=url>",
      "Add HTTP backend inline (repeatable)",
      collect,
      [],
    )
    .option("--transport <type>", "Transport: stdio | http", "stdio")
    .option("--port <port>", "Port for HTTP transport", "3050")
    .option("--api-key <key>", "API key for HTTP transport auth")
    .option("--call-timeout <ms>", "Timeout for each backend tool call in ms")
    .action(async (options: ServeOptions) => {
      try {
        if (options.transport !== "stdio" && options.transport !== "http") {
          throw new Error(`Unknown transport "${options.transport}". Use stdio or http`);
        }

        const config = await discoverConfig({
          configPath: options.config,
          hierarchyPath: options.hierarchy,
          inlineServers: parseInlineServers(options.server),
          inlineUrls: parseInlineUrls(options.serverUrl),
        });

        if (!config.hierarchyPath) {
          throw new Error(
            "No hierarchy configured. Use --hierarchy or set \"hierarchy\" in .mcp.json",
          );
        }
        if (Object.keys(config.servers).length === 0) {
          throw new Error(
            "No backend servers configured. Use --config, --server, or create .mcp.json",
          );
        }

        const store = await loadHierarchy(config.hierarchyPath);
        const gateway = createGateway(config, store, {
          callTimeoutMs: options.callTimeout
            ? parsePositiveInt(options.callTimeout, "--call-timeout", MAX_TIMEOUT_MS)
            : undefined,
        });

        let closeTransport: () => Promise<void>;
        if (options.transport === "http") {
          const { startHttpServer } = await import("../transport/http-server.js");
          const server = await startHttpServer(gateway.context, gateway.registry, {
            port: parsePositiveInt(options.port, "--port", 65535),
            apiKey: options.apiKey,
          });
          closeTransport = server.close;
        } else {
          const server = new GatewayServer(gateway.context);
          await server.serve();
          closeTransport = () => server.close();
        }

        const shutdown = async () => {
          log("Shutting down...");
          try {
            await closeTransport();
            await gateway.shutdown();
            process.exit(0);
          } catch (err) {
            logError(
              `shutdown failed: ${err instanceof Error ? err.message : String(err)}`,
            );
            process.exit(1);
          }
        };

        process.on("SIGINT", () => void shutdown());
        process.on("SIGTERM", () => void shutdown());
      } catch (err) {
        logError(
          `serve failed: ${err instanceof Error ? err.message : String(err)}`,
        );
        process.exit(1);
      }
    });
}
