/**
 * Host-side permission boundary around execute_tool.
 *
 * The dispatcher never consults this module. The gateway server runs the
 * configured policy before dispatching, handing it `tool_path` and
 * `arguments` exactly as the agent sent them.
 */

import { execFile } from "node:child_process";
import type { PermissionsConfig } from "../config/types";
import { findMatchingGlob } from "../util/glob";
import { log, warn } from "../util/logger";

export type PolicyDecision =
  | { action: "allow"; }
  | { action: "ask"; reason: string; }
  | { action: "deny"; reason: string; };

export type PolicyVerdict =
  | { allowed: true; }
  | { allowed: false; reason: string; };

export interface ExecutionPolicy {
  check(toolPath: string, args: Record<string, unknown>): Promise<PolicyVerdict>;
}

export const DEFAULT_CONFIRMATION_TIMEOUT_S = 10;

export interface ConfirmationRequest {
  tool_path: string;
  arguments: Record<string, unknown>;
  reason: string;
}

/**
 * Run a confirmation hook: the request goes to its stdin as JSON, exit code
 * 0 confirms. The command is split on whitespace into a program and its
 * arguments, without a shell. A hook that cannot be started, exits non-zero or outlives the
 * timeout does not confirm.
 */
export function runConfirmationHook(
  command: string,
  request: ConfirmationRequest,
  timeoutMs: number,
): Promise<{ confirmed: boolean; message: string; }> {
  const [file = "", ...args] = command.trim().split(/\s+/);
  return new Promise(resolve => {
    const child = execFile(
      file,
      args,
      { timeout: timeoutMs, maxBuffer: 1024 * 1024 },
      (err, _stdout, stderr) => {
        const output = String(stderr).trim();
        if (err) {
          resolve({ confirmed: false, message: output || err.message });
          return;
        }
        resolve({ confirmed: true, message: output });
      },
    );
    child.stdin?.on("error", err => {
      log(`Confirmation hook stdin closed early: ${err.message}`);
    });
    child.stdin?.end(JSON.stringify(request));
  });
}

/**
 * Allow/ask/deny by tool path patterns. `denied` wins over `sensitive`;
 * anything matching neither is allowed.
 */
export class PatternPolicy implements ExecutionPolicy {
  private denied: string[];
  private sensitive: string[];
  private confirmationHook?: string;
  private confirmationTimeoutMs: number;

  constructor(config: PermissionsConfig = {}) {
    this.denied = config.denied ?? [];
    this.sensitive = config.sensitive ?? [];
    this.confirmationHook = config.confirmationHook;
    this.confirmationTimeoutMs =
      (config.confirmationTimeout ?? DEFAULT_CONFIRMATION_TIMEOUT_S) * 1000;
  }

  evaluate(toolPath: string): PolicyDecision {
    if (findMatchingGlob(toolPath, this.denied)) {
      return {
        action: "deny",
        reason: `Tool ${toolPath} is blocked by security policy`,
      };
    }
    if (findMatchingGlob(toolPath, this.sensitive)) {
      return {
        action: "ask",
        reason: `Tool ${toolPath} is a public-facing action and requires confirmation`,
      };
    }
    return { action: "allow" };
  }

  async check(
    toolPath: string,
    args: Record<string, unknown>,
  ): Promise<PolicyVerdict> {
    const decision = this.evaluate(toolPath);
    if (decision.action === "allow") return { allowed: true };
    if (decision.action === "deny") {
      warn(decision.reason);
      return { allowed: false, reason: decision.reason };
    }

    if (!this.confirmationHook) {
      warn(`${decision.reason}; no confirmation hook configured, proceeding`);
      return { allowed: true };
    }

    log(`Asking confirmation hook for ${toolPath}`);
    const result = await runConfirmationHook(
      this.confirmationHook,
      { tool_path: toolPath, arguments: args, reason: decision.reason },
      this.confirmationTimeoutMs,
    );
    if (result.confirmed) return { allowed: true };
    return {
      allowed: false,
      reason: result.message
        ? `${decision.reason}\n${result.message}`
        : decision.reason,
    };
  }
}
