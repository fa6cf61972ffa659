/**
 * Load the persisted hierarchy file written by the offline crawler.
 */

import { readFile } from "node:fs/promises";
import { ZodError } from "zod";
import { validateHierarchy } from "./schema";
import { HierarchyStore } from "./store";
import { log } from "../util/logger";

export class HierarchyLoadError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: { cause?: unknown; },
  ) {
    super(`Cannot load hierarchy from ${filePath}: ${reason}`, options);
    this.name = "HierarchyLoadError";
  }
}

function formatZodIssues(err: ZodError): string {
  return err.issues
    .map(i => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

export function parseHierarchy(filePath: string, content: string): HierarchyStore {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new HierarchyLoadError(
      filePath,
      `invalid JSON (${err instanceof Error ? err.message : String(err)})`,
      { cause: err },
    );
  }

  try {
    return HierarchyStore.fromDefinition(validateHierarchy(data));
  } catch (err) {
    const reason = err instanceof ZodError
      ? formatZodIssues(err)
      : err instanceof Error
      ? err.message
      : String(err);
    throw new HierarchyLoadError(filePath, reason, { cause: err });
  }
}

export async function loadHierarchy(filePath: string): Promise<HierarchyStore> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new HierarchyLoadError(
      filePath,
      err instanceof Error ? err.message : String(err),
      { cause: err },
    );
  }

  const store = parseHierarchy(filePath, content);
  log(`Loaded hierarchy from ${filePath} (${store.servers().length} backends referenced)`);
  return store;
}
