import { describe, it, expect } from "vitest";
import { isMiss } from "./miss.js";
import { childKey, isWithin, normalizePath, parentKey } from "./normalize.js";

describe("normalizePath", () => {
  it.each([
    ["/about", "about"],
    ["/", ""],
    ["", ""],
    ["/blog/", "blog"],
    ["/blog/./post%20one/", "blog/post one"],
    ["//static///logo.png", "static/logo.png"],
    ["/a%3Fb", "a?b"],
    ["/caf%C3%A9.html", "café.html"],
  ])("normalizes %j to %j", (raw, expected) => {
    expect(normalizePath(raw)).toBe(expected);
  });

  it.each([
    ["/../etc/passwd", "traversal"],
    ["/a/../b", "traversal"],
    ["/a/..", "traversal"],
    ["/%2e%2e/etc/passwd", "traversal"],
    ["/a%2F..%2Fb", "traversal"],
    ["/%252e%252e/secret", "invalid-encoding"],
    ["/100%25.txt", "invalid-encoding"],
    ["/%zz", "invalid-encoding"],
    ["/a%00b", "invalid-characters"],
    ["/a%0Ab", "invalid-characters"],
    ["/a\u007fb", "invalid-characters"],
    ["/..%5c..%5cetc", "invalid-characters"],
    ["/a\\b", "invalid-characters"],
  ])("rejects %j as forbidden (%s)", (raw, cause) => {
    const result = normalizePath(raw);
    expect(isMiss(result)).toBe(true);
    expect(result).toEqual({ type: "miss", reason: "forbidden", path: raw, cause });
  });

  it("never yields a '..' segment and is idempotent", () => {
    const inputs = [
      "/about",
      "/blog/",
      "/./a/./b/",
      "/x%20y/z",
      "/a%3Fb",
      "/%2e/a",
      "/.../a",
      "/a/..b/c..",
      "/../x",
      "/%2e%2e",
    ];

    for (const raw of inputs) {
      const once = normalizePath(raw);
      if (isMiss(once)) {
        expect(once.reason).toBe("forbidden");
        continue;
      }
      expect(once.split("/")).not.toContain("..");
      expect(normalizePath(once)).toBe(once);
    }
  });

  it("keeps segments that merely contain dots", () => {
    expect(normalizePath("/.../a")).toBe(".../a");
    expect(normalizePath("/a/..b/c..")).toBe("a/..b/c..");
  });
});

describe("route key helpers", () => {
  it("parentKey walks one level up", () => {
    expect(parentKey("a/b/c")).toBe("a/b");
    expect(parentKey("a")).toBe("");
    expect(parentKey("")).toBe("");
  });

  it("childKey joins without a leading slash at the root", () => {
    expect(childKey("", "a")).toBe("a");
    expect(childKey("a/b", "c")).toBe("a/b/c");
  });

  it("isWithin matches the prefix itself and its descendants only", () => {
    expect(isWithin("blog", "blog")).toBe(true);
    expect(isWithin("blog/post", "blog")).toBe(true);
    expect(isWithin("blog.tmpl", "blog")).toBe(false);
    expect(isWithin("blogs/x", "blog")).toBe(false);
    expect(isWithin("anything", "")).toBe(true);
  });
});
