import { describe, it, expect } from "vitest";
import { resolveReference, repositoryKey } from "../docs/reference";
import { InvalidReferenceError } from "../docs/errors";

describe("resolveReference", () => {
  it("parses owner/repo shorthand with the default branch", () => {
    expect(resolveReference("vercel/next.js")).toEqual({
      owner: "vercel",
      name: "next.js",
      branch: "main",
    });
  });

  it("parses a repository URL", () => {
    expect(resolveReference("https://github.com/owner/repo")).toEqual({
      owner: "owner",
      name: "repo",
      branch: "main",
    });
  });

  it("takes the branch from a /tree/ URL", () => {
    const ref = resolveReference("https://github.com/owner/repo/tree/develop");
    expect(ref.branch).toBe("develop");
  });

  it("ignores trailing slashes", () => {
    expect(resolveReference("https://github.com/owner/repo/").name).toBe("repo");
  });

  it("falls back to main for non-tree paths", () => {
    const ref = resolveReference("https://github.com/owner/repo/blob/dev/README.md");
    expect(ref.branch).toBe("main");
  });

  it("ignores a third shorthand segment; branches need a /tree/ URL", () => {
    expect(resolveReference("owner/repo/dev").branch).toBe("main");
    expect(resolveReference("https://github.com/owner/repo/tree/dev").branch).toBe("dev");
  });

  it("treats an owner starting with http as shorthand", () => {
    expect(resolveReference("httpie/cli")).toEqual({
      owner: "httpie",
      name: "cli",
      branch: "main",
    });
  });

  it("returns a frozen value", () => {
    expect(Object.isFrozen(resolveReference("owner/repo"))).toBe(true);
  });

  it.each(["invalid", "https://github.com/owner", "http://", "/repo"])(
    "rejects %s",
    (reference) => {
      expect(() => resolveReference(reference)).toThrow(InvalidReferenceError);
    }
  );

  it("includes the input in the error message", () => {
    expect(() => resolveReference("invalid")).toThrow("Invalid GitHub URL format: invalid");
  });
});

describe("repositoryKey", () => {
  it("joins owner, name and branch", () => {
    expect(repositoryKey({ owner: "a", name: "b", branch: "dev" })).toBe("a/b/dev");
  });

  it("gives shorthand and URL forms the same key", () => {
    expect(repositoryKey(resolveReference("owner/repo"))).toBe(
      repositoryKey(resolveReference("https://github.com/owner/repo/tree/main"))
    );
  });
});
