/**
 * Agent-facing meta tools and their call handling, shared by the stdio and
 * HTTP transports.
 */

import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  type CallToolResult,
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z, ZodError } from "zod";
import type { Dispatcher } from "./dispatcher";
import { isGatewayError } from "./errors";
import type { ExecutionPolicy } from "./policy";
import { error as logError, log } from "../util/logger";

export const GET_TOOLS_IN_CATEGORY = "get_tools_in_category";
export const EXECUTE_TOOL = "execute_tool";

const browseArgsSchema = z.object({
  path: z.string().default(""),
});

const executeArgsSchema = z.object({
  tool_path: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).default({}),
});

export interface GatewayContext {
  dispatcher: Dispatcher;
  policy?: ExecutionPolicy;
  /** Root description of the hierarchy, shown in the browse tool. */
  overview?: string;
}

export function getMetaTools(overview?: string): Tool[] {
  const intro = overview ? `${overview}\n\n` : "";
  return [
    {
      name: GET_TOOLS_IN_CATEGORY,
      description: `${intro}Browse the tool hierarchy. Returns the sub-categories and tools under a `
        + `dot-separated category path (empty string for the top level), each with its description.`,
      inputSchema: {
        type: "object",
        properties: {
          path: {
            type: "string",
            description: "Category path, e.g. \"coding_tools.serena\"; \"\" for the root",
          },
        },
      },
    },
    {
      name: EXECUTE_TOOL,
      description: "Execute a tool by its full hierarchy path, e.g. \"coding_tools.serena.find_symbol\". "
        + "Use get_tools_in_category first to find the path and its arguments.",
      inputSchema: {
        type: "object",
        properties: {
          tool_path: {
            type: "string",
            description: "Full dot-separated path of the tool",
          },
          arguments: {
            type: "object",
            description: "Arguments passed unchanged to the tool",
          },
        },
        required: ["tool_path"],
      },
    },
  ];
}

function errorResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

function describeFailure(err: unknown): string {
  if (isGatewayError(err)) return `Error [${err.code}]: ${err.message}`;
  if (err instanceof ZodError) {
    const issues = err.issues
      .map(i => `${i.path.join(".") || "(arguments)"}: ${i.message}`)
      .join("; ");
    return `Error [InvalidArguments]: ${issues}`;
  }
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}

export async function handleMetaToolCall(
  context: GatewayContext,
  name: string,
  args: Record<string, unknown>,
): Promise<CallToolResult> {
  try {
    if (name === GET_TOOLS_IN_CATEGORY) {
      const { path } = browseArgsSchema.parse(args);
      const listing = context.dispatcher.getToolsInCategory(path);
      return {
        content: [{ type: "text", text: JSON.stringify(listing, null, 2) }],
      };
    }

    if (name === EXECUTE_TOOL) {
      const parsed = executeArgsSchema.parse(args);
      if (context.policy) {
        const verdict = await context.policy.check(parsed.tool_path, parsed.arguments);
        if (!verdict.allowed) {
          return errorResult(`Denied: ${verdict.reason}`);
        }
      }
      return await context.dispatcher.executeTool(parsed.tool_path, parsed.arguments);
    }

    return errorResult(
      `Unknown tool: ${name}. Available: ${GET_TOOLS_IN_CATEGORY}, ${EXECUTE_TOOL}`,
    );
  } catch (err) {
    const text = describeFailure(err);
    logError(`${name} failed: ${text}`);
    return errorResult(text);
  }
}

export function registerGatewayHandlers(
  server: Server,
  context: GatewayContext,
): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: getMetaTools(context.overview),
  }));

  server.setRequestHandler(CallToolRequestSchema, async request => {
    const { name, arguments: args } = request.params;
    log(`Meta tool call: ${name}`);
    return handleMetaToolCall(context, name, args ?? {});
  });
}
