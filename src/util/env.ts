/**
 * Expand ${VAR} and ${VAR:-fallback} references from process.env.
 */

import { warn } from "./logger";

const ENV_VAR_RE = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

export function expandEnvVars(
  value: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return value.replace(
    ENV_VAR_RE,
    (_match, varName: string, fallback: string | undefined) => {
      const resolved = env[varName];
      if (resolved !== undefined && resolved !== "") return resolved;
      if (fallback !== undefined) return fallback;
      if (resolved === undefined) {
        warn(`Environment variable '${varName}' is not set`);
      }
      return "";
    },
  );
}

export function expandEnvRecord(
  record: Record<string, string>,
  env: Record<string, string | undefined> = process.env,
): Record<string, string> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key, expandEnvVars(value, env)]),
  );
}
