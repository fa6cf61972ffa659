/**
 * Zod schemas for validating .mcp.json config files.
 */

import { z } from "zod";
import { MAX_TIMEOUT_MS } from "../util/timeout";

const stdioServerSchema = z.object({
  type: z.literal("stdio").optional(),
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  env: z.record(z.string(), z.string()).optional(),
  cwd: z.string().optional(),
});

const httpServerSchema = z.object({
  type: z.enum(["sse", "url"]),
  url: z.string().url(),
  env: z.record(z.string(), z.string()).optional(),
});

export const serverConfigSchema = z.union([
  stdioServerSchema,
  httpServerSchema,
]);

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).optional(),
  initialDelayMs: z.number().int().min(0).optional(),
  maxDelayMs: z.number().int().min(0).optional(),
});

const gatewaySettingsSchema = z.object({
  callTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  connectTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  retry: retrySchema.optional(),
});

const permissionsSchema = z.object({
  denied: z.array(z.string()).optional(),
  sensitive: z.array(z.string()).optional(),
  confirmationHook: z.string().min(1).optional(),
  // Seconds, multiplied into a timer delay.
  confirmationTimeout: z.number().positive().max(Math.floor(MAX_TIMEOUT_MS / 1000)).optional(),
});

export const gatewayConfigFileSchema = z.object({
  mcpServers: z.record(z.string(), serverConfigSchema),
  hierarchy: z.string().min(1).optional(),
  gateway: gatewaySettingsSchema.optional(),
  permissions: permissionsSchema.optional(),
});

export type ValidatedGatewayConfig = z.infer<typeof gatewayConfigFileSchema>;

export function validateConfig(data: unknown): ValidatedGatewayConfig {
  return gatewayConfigFileSchema.parse(data);
}
