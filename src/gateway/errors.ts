/**
 * Typed failures surfaced by the dispatch engine.
 *
 * Every error carries a stable `code` so the agent-facing layer can report it
 * without inspecting message text.
 */

export type GatewayErrorCode =
  | "PathNotFound"
  | "NotACategory"
  | "NotATool"
  | "ServerSpawnFailed"
  | "ServerUnavailable"
  | "BackendError"
  | "Timeout";

export class GatewayError extends Error {
  constructor(
    public readonly code: GatewayErrorCode,
    message: string,
    options?: { cause?: unknown; },
  ) {
    super(message, options);
    this.name = "GatewayError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class PathNotFoundError extends GatewayError {
  constructor(
    public readonly path: string,
    public readonly segment: string,
  ) {
    super("PathNotFound", `Path not found: "${path}" (no entry named "${segment}")`);
    this.name = "PathNotFoundError";
  }
}

export class NotACategoryError extends GatewayError {
  constructor(public readonly path: string) {
    super("NotACategory", `"${path}" is a tool, not a category`);
    this.name = "NotACategoryError";
  }
}

export class NotAToolError extends GatewayError {
  constructor(public readonly path: string) {
    super(
      "NotATool",
      `"${path || "(root)"}" is a category, not a tool. Browse it with get_tools_in_category`,
    );
    this.name = "NotAToolError";
  }
}

export class ServerSpawnFailedError extends GatewayError {
  constructor(
    public readonly serverName: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("ServerSpawnFailed", `Failed to start backend "${serverName}": ${reason}`, {
      cause,
    });
    this.name = "ServerSpawnFailedError";
  }
}

export class ServerUnavailableError extends GatewayError {
  constructor(
    public readonly serverName: string,
    /** Milliseconds until the next start attempt, or null once retries are exhausted. */
    public readonly retryInMs: number | null,
    lastError?: string,
    /** Replaces the retry wording, for backends that will not come back. */
    reason?: string,
  ) {
    const when = reason ?? (retryInMs === null
      ? "retries exhausted, reset required"
      : `retry in ${retryInMs}ms`);
    const detail = lastError ? `; last error: ${lastError}` : "";
    super("ServerUnavailable", `Backend "${serverName}" is unavailable (${when})${detail}`);
    this.name = "ServerUnavailableError";
  }
}

export class BackendError extends GatewayError {
  constructor(
    public readonly serverName: string,
    public readonly toolId: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("BackendError", `${serverName}/${toolId} failed: ${reason}`, { cause });
    this.name = "BackendError";
  }
}

export class TimeoutError extends GatewayError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super("Timeout", `${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}
