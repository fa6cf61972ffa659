import { beforeEach, describe, expect, it, vi } from "vitest";
import { PatternPolicy, runConfirmationHook } from "../../src/gateway/policy.js";

type ExecCallback = (err: Error | null, stdout: string, stderr: string) => void;

const mockExecFile = vi.hoisted(() => vi.fn());
const mockStdinEnd = vi.hoisted(() => vi.fn());

vi.mock("node:child_process", () => ({
  execFile: mockExecFile,
}));

function hookExits(err: Error | null, stderr = "") {
  mockExecFile.mockImplementation(
    (_cmd: string, _args: string[], _opts: unknown, callback: ExecCallback) => {
      setTimeout(() => callback(err, "", stderr), 0);
      return { stdin: { on: vi.fn(), end: mockStdinEnd } };
    },
  );
}

describe("PatternPolicy.evaluate", () => {
  const policy = new PatternPolicy({
    denied: ["gmail.*"],
    sensitive: ["*.delete_*", "github.create_issue"],
  });

  it("denies matching paths", () => {
    expect(policy.evaluate("gmail.send_email")).toEqual({
      action: "deny",
      reason: "Tool gmail.send_email is blocked by security policy",
    });
  });

  it("asks for sensitive paths", () => {
    expect(policy.evaluate("github.delete_repo")).toEqual({
      action: "ask",
      reason: "Tool github.delete_repo is a public-facing action and requires confirmation",
    });
    expect(policy.evaluate("github.create_issue").action).toBe("ask");
  });

  it("lets deny win over ask", () => {
    expect(policy.evaluate("gmail.delete_message").action).toBe("deny");
  });

  it("allows everything else", () => {
    expect(policy.evaluate("github.search_code")).toEqual({ action: "allow" });
  });

  it("allows everything with an empty configuration", () => {
    expect(new PatternPolicy().evaluate("gmail.send_email")).toEqual({ action: "allow" });
  });
});

describe("PatternPolicy.check", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("refuses denied paths without running the hook", async () => {
    const policy = new PatternPolicy({ denied: ["gmail.*"], confirmationHook: "/bin/confirm" });
    await expect(policy.check("gmail.send_email", {})).resolves.toEqual({
      allowed: false,
      reason: "Tool gmail.send_email is blocked by security policy",
    });
    expect(mockExecFile).not.toHaveBeenCalled();
  });

  it("proceeds on sensitive paths when no hook is configured", async () => {
    const policy = new PatternPolicy({ sensitive: ["*.delete_*"] });
    await expect(policy.check("github.delete_repo", {})).resolves.toEqual({ allowed: true });
  });

  it("sends the request to the hook and allows on exit 0", async () => {
    hookExits(null);
    const policy = new PatternPolicy({
      sensitive: ["*.delete_*"],
      confirmationHook: "/bin/confirm",
      confirmationTimeout: 3,
    });
    const args = { repo: "demo" };

    await expect(policy.check("github.delete_repo", args)).resolves.toEqual({ allowed: true });
    expect(mockExecFile).toHaveBeenCalledWith(
      "/bin/confirm",
      [],
      { timeout: 3000, maxBuffer: 1024 * 1024 },
      expect.any(Function),
    );
    expect(mockStdinEnd).toHaveBeenCalledWith(
      JSON.stringify({
        tool_path: "github.delete_repo",
        arguments: { repo: "demo" },
        reason: "Tool github.delete_repo is a public-facing action and requires confirmation",
      }),
    );
  });

  it("splits a hook command into program and arguments", async () => {
    hookExits(null);
    const policy = new PatternPolicy({
      sensitive: ["*.delete_*"],
      confirmationHook: " python3  hooks/confirm.py --strict ",
    });

    await expect(policy.check("github.delete_repo", {})).resolves.toEqual({ allowed: true });
    expect(mockExecFile).toHaveBeenCalledWith(
      "python3",
      ["hooks/confirm.py", "--strict"],
      { timeout: 10000, maxBuffer: 1024 * 1024 },
      expect.any(Function),
    );
  });

  it("denies with the hook's stderr when it exits non-zero", async () => {
    hookExits(new Error("Command failed: /bin/confirm"), "User declined\n");
    const policy = new PatternPolicy({
      sensitive: ["*.delete_*"],
      confirmationHook: "/bin/confirm",
    });

    await expect(policy.check("github.delete_repo", {})).resolves.toEqual({
      allowed: false,
      reason: "Tool github.delete_repo is a public-facing action and requires confirmation\nUser declined",
    });
  });
});

describe("runConfirmationHook", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("reports the process error when stderr is empty", async () => {
    hookExits(new Error("spawn /bin/missing ENOENT"));
    await expect(
      runConfirmationHook("/bin/missing", { tool_path: "a.b", arguments: {}, reason: "r" }, 1000),
    ).resolves.toEqual({ confirmed: false, message: "spawn /bin/missing ENOENT" });
  });

  it("confirms on success", async () => {
    hookExits(null, "ok\n");
    await expect(
      runConfirmationHook("/bin/confirm", { tool_path: "a.b", arguments: {}, reason: "r" }, 1000),
    ).resolves.toEqual({ confirmed: true, message: "ok" });
  });
});
