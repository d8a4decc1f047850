import { join, resolve } from "node:path";
import { describe, expect, it } from "vitest";
import { PathSandboxError, resolveWithinRoot, toRepoPath } from "./paths.js";

const root = resolve("/work/repo");

describe("resolveWithinRoot", () => {
  it("resolves relative paths against the root", () => {
    expect(resolveWithinRoot(root, "src/a.ts")).toBe(join(root, "src", "a.ts"));
  });

  it("accepts names that merely start with two dots", () => {
    expect(resolveWithinRoot(root, "..env.local")).toBe(join(root, "..env.local"));
  });

  it("rejects paths that leave the root", () => {
    expect(() => resolveWithinRoot(root, "..")).toThrow(PathSandboxError);
    expect(() => resolveWithinRoot(root, "../other/a.ts")).toThrow(PathSandboxError);
    expect(() => resolveWithinRoot(root, "/etc/passwd")).toThrow(PathSandboxError);
  });
});

describe("toRepoPath", () => {
  it("normalizes absolute and dotted paths to the repository form", () => {
    expect(toRepoPath(root, join(root, "src", "a.ts"))).toBe("src/a.ts");
    expect(toRepoPath(root, "./src/../b.ts")).toBe("b.ts");
  });
});
