/**
 * Discover and merge .mcp.json config files.
 *
 * Precedence (later wins on conflict):
 * 1. $HOME/.mcp.json (global)
 * 2. .mcp.json in CWD (project-level)
 * 3. --config <path> (explicit, replaces CWD)
 * 4. --server / --server-url / --hierarchy flags
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { homedir } from "node:os";
import { ZodError } from "zod";
import { validateConfig, type ValidatedGatewayConfig } from "./schema";
import type { GatewaySettings, PermissionsConfig, ResolvedConfig, ServerConfig } from "./types";
import { expandEnvRecord } from "../util/env";
import { log } from "../util/logger";

export class ConfigError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: { cause?: unknown; },
  ) {
    super(`Invalid configuration in ${filePath}: ${reason}`, options);
    this.name = "ConfigError";
  }
}

async function loadConfigFile(path: string): Promise<ValidatedGatewayConfig> {
  let parsed: unknown;
  try {
    const content = await readFile(path, "utf-8");
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(path, err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  }

  try {
    const validated = validateConfig(parsed);
    log(
      `Loaded config from ${path} (${Object.keys(validated.mcpServers).length} servers)`,
    );
    return validated;
  } catch (err) {
    const reason = err instanceof ZodError
      ? err.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ")
      : err instanceof Error
      ? err.message
      : String(err);
    throw new ConfigError(path, reason, { cause: err });
  }
}

export interface DiscoveryOptions {
  configPath?: string;
  hierarchyPath?: string;
  inlineServers?: Array<{ name: string; command: string; }>;
  inlineUrls?: Array<{ name: string; url: string; }>;
}

function mergeGateway(
  base: GatewaySettings,
  next: GatewaySettings | undefined,
): GatewaySettings {
  if (!next) return base;
  return {
    ...base,
    ...next,
    retry: base.retry || next.retry ? { ...base.retry, ...next.retry } : undefined,
  };
}

export async function discoverConfig(
  options: DiscoveryOptions = {},
): Promise<ResolvedConfig> {
  const servers: Record<string, ServerConfig> = {};
  const configSources: string[] = [];
  let gateway: GatewaySettings = {};
  let permissions: PermissionsConfig | undefined;
  let hierarchyPath: string | undefined;

  const apply = (path: string, loaded: ValidatedGatewayConfig): void => {
    configSources.push(path);
    Object.assign(servers, loaded.mcpServers);
    gateway = mergeGateway(gateway, loaded.gateway);
    if (loaded.permissions) permissions = loaded.permissions;
    if (loaded.hierarchy) {
      hierarchyPath = resolve(dirname(path), loaded.hierarchy);
    }
  };

  // 1. Global config
  const globalPath = join(homedir(), ".mcp.json");
  if (existsSync(globalPath)) {
    apply(globalPath, await loadConfigFile(globalPath));
  }

  // 2. Project-level or explicit config (resolve relative paths from CWD)
  const projectPath = options.configPath
    ? resolve(process.cwd(), options.configPath)
    : join(process.cwd(), ".mcp.json");
  if (existsSync(projectPath)) {
    apply(projectPath, await loadConfigFile(projectPath));
  } else if (options.configPath) {
    throw new ConfigError(projectPath, "file does not exist");
  }

  // 3. Inline --server flags
  if (options.inlineServers) {
    for (const { name, command } of options.inlineServers) {
      const parts = command.split(/\s+/);
      servers[name] = {
        type: "stdio",
        command: parts[0] ?? "",
        args: parts.slice(1),
      };
    }
  }

  // 4. Inline --server-url flags
  if (options.inlineUrls) {
    for (const { name, url } of options.inlineUrls) {
      servers[name] = { type: "url", url };
    }
  }

  if (options.hierarchyPath) {
    hierarchyPath = resolve(process.cwd(), options.hierarchyPath);
  }

  // Expand env vars in all server configs
  for (const config of Object.values(servers)) {
    if (config.env) {
      config.env = expandEnvRecord(config.env);
    }
  }

  log(`Resolved ${Object.keys(servers).length} total servers`);
  return { servers, hierarchyPath, gateway, permissions, configSources };
}
