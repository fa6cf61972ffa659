/**
 * Zod schemas for the persisted hierarchy file.
 */

import { z } from "zod";

export interface ToolDefinition {
  type: "tool";
  description?: string;
  /** Name of the backend server that owns the tool. */
  server: string;
  /** Backend-native tool name; defaults to the node's own name. */
  tool?: string;
  inputSchema?: Record<string, unknown>;
}

export interface CategoryDefinition {
  type: "category";
  description?: string;
  children: Record<string, NodeDefinition>;
}

export type NodeDefinition = ToolDefinition | CategoryDefinition;

export interface HierarchyDefinition {
  overview?: string;
  children: Record<string, NodeDefinition>;
}

const toolDefinitionSchema = z.object({
  type: z.literal("tool"),
  description: z.string().optional(),
  server: z.string().min(1),
  tool: z.string().min(1).optional(),
  inputSchema: z.record(z.string(), z.unknown()).optional(),
});

export const nodeDefinitionSchema: z.ZodType<NodeDefinition> = z.lazy(() =>
  z.union([
    toolDefinitionSchema,
    z.object({
      type: z.literal("category"),
      description: z.string().optional(),
      children: z.record(z.string(), nodeDefinitionSchema),
    }),
  ])
);

export const hierarchyFileSchema: z.ZodType<HierarchyDefinition> = z.object({
  overview: z.string().optional(),
  children: z.record(z.string(), nodeDefinitionSchema),
});

export function validateHierarchy(data: unknown): HierarchyDefinition {
  return hierarchyFileSchema.parse(data);
}
