import { beforeEach, describe, expect, it, vi } from "vitest";
import { HierarchyLoadError, loadHierarchy, parseHierarchy } from "../../src/hierarchy/loader.js";

const mockReadFile = vi.hoisted(() => vi.fn());

vi.mock("node:fs/promises", () => ({
  readFile: mockReadFile,
  default: { readFile: mockReadFile },
}));

const validFile = JSON.stringify({
  overview: "All tools",
  children: {
    gmail: {
      type: "category",
      description: "Email",
      children: {
        send_email: { type: "tool", description: "Send an email", server: "gmail" },
      },
    },
  },
});

describe("parseHierarchy", () => {
  it("builds a store from a valid file", () => {
    const store = parseHierarchy("/h.json", validFile);
    expect(store.overview).toBe("All tools");
    expect(store.listChildren("gmail")).toEqual({
      categories: {},
      tools: { send_email: "Send an email" },
    });
  });

  it("rejects invalid JSON", () => {
    expect(() => parseHierarchy("/h.json", "{ not json")).toThrow(HierarchyLoadError);
    expect(() => parseHierarchy("/h.json", "{ not json")).toThrow(
      /Cannot load hierarchy from \/h\.json: invalid JSON/,
    );
  });

  it("rejects a missing children map", () => {
    expect(() => parseHierarchy("/h.json", JSON.stringify({ overview: "x" }))).toThrow(
      HierarchyLoadError,
    );
  });

  it("rejects a tool without a server", () => {
    const content = JSON.stringify({
      children: { t: { type: "tool", description: "no owner" } },
    });
    expect(() => parseHierarchy("/h.json", content)).toThrow(HierarchyLoadError);
  });

  it("reports names containing the separator", () => {
    const content = JSON.stringify({
      children: { "a.b": { type: "tool", server: "s" } },
    });
    expect(() => parseHierarchy("/h.json", content)).toThrow(
      "Cannot load hierarchy from /h.json: Invalid hierarchy entry at \"a.b\": child name \"a.b\" must not contain \".\"",
    );
  });
});

describe("loadHierarchy", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("reads and parses the file", async () => {
    mockReadFile.mockResolvedValue(validFile);
    const store = await loadHierarchy("/data/hierarchy.json");
    expect(mockReadFile).toHaveBeenCalledWith("/data/hierarchy.json", "utf-8");
    expect(store.servers()).toEqual(["gmail"]);
  });

  it("wraps read errors", async () => {
    mockReadFile.mockRejectedValue(new Error("ENOENT: no such file"));
    await expect(loadHierarchy("/missing.json")).rejects.toThrow(
      "Cannot load hierarchy from /missing.json: ENOENT: no such file",
    );
  });
});
