#!/usr/bin/env node
/**
 * toolpath: hierarchical MCP gateway CLI
 *
 * Usage:
 *   toolpath serve [options]    Start the gateway (stdio or http)
 *   toolpath browse [path]      List a hierarchy category offline
 */

import { config } from "dotenv";
import { program } from "commander";
import { registerBrowseCommand } from "./commands/browse";
import { registerServeCommand } from "./commands/serve";
import { setVerbose } from "./util/logger";

// Load environment variables from .env.local and .env
config({ path: ".env.local", quiet: true });
config({ path: ".env", quiet: true });

const VERSION = "0.1.0";

async function main(): Promise<void> {
  program
    .name("toolpath")
    .description("MCP gateway: browse and call backend tools through a category hierarchy")
    .version(VERSION)
    .option("--verbose", "Verbose logging to stderr")
    .hook("preAction", thisCommand => {
      const opts = thisCommand.opts<{ verbose?: boolean; }>();
      if (opts.verbose) {
        setVerbose(true);
      }
    });

  registerServeCommand(program);
  registerBrowseCommand(program);

  await program.parseAsync();
}

main().catch(err => {
  console.error(`toolpath: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
