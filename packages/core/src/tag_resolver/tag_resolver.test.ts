import { TagResolver, resolveTag } from "./tag_resolver";
import type { TagPattern } from "./tag_resolver";

describe("resolveTag", () => {
  const patterns: TagPattern<string>[] = [
    { tag: "T1", pattern: "*.a" },
    { tag: "T2", pattern: "*.*" },
  ];

  it("should pick the first pattern in list order that matches", () => {
    expect(resolveTag(patterns, "x.a")).toBe("T1");
    expect(resolveTag(patterns, "x.b")).toBe("T2");
  });

  it("should return undefined when nothing matches", () => {
    expect(resolveTag(patterns, "README")).toBeUndefined();
  });

  it("should not let a single star cross directories for relative paths", () => {
    expect(resolveTag([{ tag: "doc", pattern: "*.md" }], "notes/a.md")).toBeUndefined();
    expect(resolveTag([{ tag: "doc", pattern: "**/*.md" }], "notes/a.md")).toBe("doc");
  });

  it("should match dotfiles", () => {
    expect(resolveTag([{ tag: "doc", pattern: "**/*.md" }], ".hidden/a.md")).toBe("doc");
  });

  it("should widen patterns for absolute paths", () => {
    const docs = [{ tag: "doc", pattern: "*.md" }];

    expect(resolveTag(docs, "/elsewhere/linked/a.md")).toBe("doc");
    expect(resolveTag(docs, "/elsewhere/linked/a.txt")).toBeUndefined();
  });

  it("should match widened absolute forms of every relative match", () => {
    const cases: Array<[string, string]> = [
      ["*.md", "a.md"],
      ["notes/*.md", "notes/a.md"],
      ["**/*.md", "x/y/a.md"],
      ["static/**", "static/img/logo.png"],
    ];

    for (const [pattern, relative] of cases) {
      const tagged = [{ tag: "t", pattern }];
      expect(resolveTag(tagged, relative)).toBe("t");
      expect(resolveTag(tagged, `/mnt/other/${relative}`)).toBe("t");
    }
  });

  it("should work with numeric tags", () => {
    expect(resolveTag([{ tag: 0, pattern: "*.md" }], "a.md")).toBe(0);
  });
});

describe("TagResolver", () => {
  it("should report ignored paths", () => {
    const resolver = new TagResolver([{ tag: "doc", pattern: "**/*.md" }], ["**/drafts/**"]);

    expect(resolver.isIgnored("drafts/a.md")).toBe(true);
    expect(resolver.isIgnored("notes/drafts/a.md")).toBe(true);
    expect(resolver.isIgnored("notes/a.md")).toBe(false);
  });

  it("should match ignore patterns against absolute paths as they are", () => {
    const resolver = new TagResolver([{ tag: "doc", pattern: "*.md" }], ["/elsewhere/drafts/**", "drafts/**"]);

    expect(resolver.isIgnored("/elsewhere/drafts/a.md")).toBe(true);
    expect(resolver.isIgnored("/elsewhere/notes/a.md")).toBe(false);
    expect(resolver.isIgnored("/mnt/drafts/a.md")).toBe(false);
  });

  it("should ignore nothing without ignore patterns", () => {
    const resolver = new TagResolver([{ tag: "doc", pattern: "**/*.md" }]);

    expect(resolver.isIgnored("drafts/a.md")).toBe(false);
  });
});
