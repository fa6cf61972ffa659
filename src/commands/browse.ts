/**
 * `toolpath browse` command: list a category of the hierarchy offline,
 * without starting any backend.
 */

import type { Command } from "commander";
import { discoverConfig } from "../config/discovery";
import { loadHierarchy } from "../hierarchy/loader";
import { formatError, formatListing } from "../util/format";

interface BrowseOptions {
  config?: string;
  hierarchy?: string;
  json?: boolean;
}

export async function browseHierarchy(
  path: string,
  options: BrowseOptions,
): Promise<string> {
  const config = await discoverConfig({
    configPath: options.config,
    hierarchyPath: options.hierarchy,
  });
  if (!config.hierarchyPath) {
    throw new Error("No hierarchy configured. Use --hierarchy or set \"hierarchy\" in .mcp.json");
  }

  const store = await loadHierarchy(config.hierarchyPath);
  const listing = store.listChildren(path);
  return options.json
    ? JSON.stringify(listing, null, 2)
    : formatListing(path, listing);
}

export function registerBrowseCommand(program: Command): void {
  program
    .command("browse")
    .description("List the categories and tools under a hierarchy path")
    .argument("[path]", "Dot-separated category path (root when omitted)", "")
    .option("--config <path>", "Path to .mcp.json config file")
    .option("--hierarchy <path>", "Path to the hierarchy JSON file")
    .option("--json", "Output as JSON")
    .action(async (path: string, options: BrowseOptions) => {
      try {
        console.log(await browseHierarchy(path, options));
      } catch (err) {
        console.error(formatError(err instanceof Error ? err.message : String(err)));
        process.exit(1);
      }
    });
}
