import { describe, expect, it } from "vitest";
import { pathRule } from "../../rules/path.js";

describe("path rule", () => {
  it("redacts absolute paths with two or more components", () => {
    expect(pathRule.redact("at /var/mobile")).toBe("at [PATH]");
    expect(pathRule.redact("at /var/mobile/Containers/x.gguf")).toBe("at [PATH]");
  });

  it("keeps single-component paths", () => {
    expect(pathRule.redact("wrote /tmp")).toBe("wrote /tmp");
  });

  it("redacts home-relative paths", () => {
    expect(pathRule.redact("~/Library/Caches/models")).toBe("[PATH]");
  });

  it("ignores slashes inside words", () => {
    expect(pathRule.redact("use and/or skip 1/2/3")).toBe("use and/or skip 1/2/3");
  });

  it("ignores URL paths", () => {
    expect(pathRule.redact("see https://example.com/a/b")).toBe("see https://example.com/a/b");
  });

  it("stops at delimiters of structured fields", () => {
    expect(pathRule.redact("Parameters: {path=/var/mobile/x.gguf, size=2}")).toBe(
      "Parameters: {path=[PATH], size=2}",
    );
    expect(pathRule.redact('file "/a/b c"')).toBe('file "[PATH] c"');
  });

  it("reports each match", () => {
    expect(pathRule.find("/a/b and /c/d/e")).toEqual([
      { rule: "path", index: 0, length: 4 },
      { rule: "path", index: 9, length: 6 },
    ]);
  });
});
