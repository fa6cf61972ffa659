/**
 * Immutable category/tool tree addressed by dot-separated paths.
 *
 * The tree is built once from a HierarchyDefinition and frozen; lookups never
 * mutate it, so any number of concurrent requests can read it without
 * coordination.
 */

import {
  NotACategoryError,
  NotAToolError,
  PathNotFoundError,
} from "../gateway/errors";
import type { HierarchyDefinition, NodeDefinition } from "./schema";

export const PATH_SEPARATOR = ".";

export interface ToolNode {
  readonly kind: "tool";
  readonly name: string;
  readonly path: string;
  readonly description: string;
  readonly serverName: string;
  readonly toolId: string;
  readonly inputSchema?: Readonly<Record<string, unknown>>;
}

export interface CategoryNode {
  readonly kind: "category";
  readonly name: string;
  readonly path: string;
  readonly description: string;
  readonly children: ReadonlyMap<string, HierarchyNode>;
}

export type HierarchyNode = ToolNode | CategoryNode;

export interface CategoryListing {
  categories: Record<string, string>;
  tools: Record<string, string>;
}

export class InvalidHierarchyError extends Error {
  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`Invalid hierarchy entry at "${path}": ${reason}`);
    this.name = "InvalidHierarchyError";
  }
}

function joinPath(parent: string, name: string): string {
  return parent ? `${parent}${PATH_SEPARATOR}${name}` : name;
}

function buildChildren(
  parentPath: string,
  definitions: Record<string, NodeDefinition>,
): ReadonlyMap<string, HierarchyNode> {
  const children = new Map<string, HierarchyNode>();
  for (const [name, definition] of Object.entries(definitions)) {
    const path = joinPath(parentPath, name);
    if (name.length === 0) {
      throw new InvalidHierarchyError(path, "child name must not be empty");
    }
    if (name.includes(PATH_SEPARATOR)) {
      throw new InvalidHierarchyError(
        path,
        `child name "${name}" must not contain "${PATH_SEPARATOR}"`,
      );
    }
    children.set(name, buildNode(name, path, definition));
  }
  return children;
}

function buildNode(
  name: string,
  path: string,
  definition: NodeDefinition,
): HierarchyNode {
  if (definition.type === "tool") {
    const tool: ToolNode = {
      kind: "tool",
      name,
      path,
      description: definition.description ?? "",
      serverName: definition.server,
      toolId: definition.tool ?? name,
      inputSchema: definition.inputSchema
        ? Object.freeze({ ...definition.inputSchema })
        : undefined,
    };
    return Object.freeze(tool);
  }

  const category: CategoryNode = {
    kind: "category",
    name,
    path,
    description: definition.description ?? "",
    children: buildChildren(path, definition.children),
  };
  return Object.freeze(category);
}

/**
 * Text shown for a tool when its category is browsed. The argument schema is
 * appended so the agent can build a call without another round trip.
 */
export function describeTool(tool: ToolNode): string {
  if (!tool.inputSchema) return tool.description;
  const schema = JSON.stringify(tool.inputSchema);
  return tool.description
    ? `${tool.description}\nArguments: ${schema}`
    : `Arguments: ${schema}`;
}

export class HierarchyStore {
  private readonly root: CategoryNode;

  constructor(root: CategoryNode) {
    this.root = root;
  }

  static fromDefinition(definition: HierarchyDefinition): HierarchyStore {
    const root: CategoryNode = {
      kind: "category",
      name: "",
      path: "",
      description: definition.overview ?? "",
      children: buildChildren("", definition.children),
    };
    return new HierarchyStore(Object.freeze(root));
  }

  /** The empty string addresses the root category. */
  lookup(path: string): HierarchyNode {
    if (path === "") return this.root;

    let node: HierarchyNode = this.root;
    for (const segment of path.split(PATH_SEPARATOR)) {
      const child: HierarchyNode | undefined = node.kind === "category"
        ? node.children.get(segment)
        : undefined;
      if (!child) {
        throw new PathNotFoundError(path, segment);
      }
      node = child;
    }
    return node;
  }

  listChildren(path: string): CategoryListing {
    const node = this.lookup(path);
    if (node.kind !== "category") {
      throw new NotACategoryError(path);
    }

    const listing: CategoryListing = { categories: {}, tools: {} };
    for (const [name, child] of node.children) {
      if (child.kind === "category") {
        listing.categories[name] = child.description;
      } else {
        listing.tools[name] = describeTool(child);
      }
    }
    return listing;
  }

  resolveTool(path: string): ToolNode {
    const node = this.lookup(path);
    if (node.kind !== "tool") {
      throw new NotAToolError(path);
    }
    return node;
  }

  /** Backend names referenced anywhere in the tree, sorted. */
  servers(): string[] {
    const names = new Set<string>();
    const visit = (node: HierarchyNode): void => {
      if (node.kind === "tool") {
        names.add(node.serverName);
        return;
      }
      for (const child of node.children.values()) visit(child);
    };
    visit(this.root);
    return [...names].sort();
  }

  get overview(): string {
    return this.root.description;
  }
}
