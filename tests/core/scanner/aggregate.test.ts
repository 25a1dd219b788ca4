import { describe, it, expect } from "vitest";

import { compileCatalog } from "@/catalog/loader.js";
import { HitTable, matchContent, splitLines, toSnippet } from "@/core/scanner/aggregate.js";
import { unwrap } from "@/lib/result.js";

const catalog = unwrap(
  compileCatalog({
    name: "aggregate-test",
    title: "Aggregate Test",
    groups: [
      {
        name: "Words",
        detectors: [
          { key: "foo", pattern: "foo" },
          { key: "never", pattern: "zzz-never" },
        ],
      },
    ],
    antiPatterns: [{ id: "bar-rule", pattern: "bar", note: "Avoid bar." }],
  })
);

describe("splitLines", () => {
  it("drops the empty segment after a final newline", () => {
    expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
  });

  it("strips carriage returns", () => {
    expect(splitLines("a\r\nb\r\n")).toEqual(["a", "b"]);
  });

  it("keeps blank lines in the middle", () => {
    expect(splitLines("a\n\nb")).toEqual(["a", "", "b"]);
  });

  it("returns no lines for empty content", () => {
    expect(splitLines("")).toEqual([]);
  });
});

describe("toSnippet", () => {
  it("expands tabs to two spaces", () => {
    expect(toSnippet("\treturn x;", 240)).toBe("  return x;");
  });

  it("truncates to the snippet length", () => {
    expect(toSnippet("abcdefgh", 3)).toBe("abc");
  });

  it("drops half of a surrogate pair cut by the snippet length", () => {
    expect(toSnippet("ab\u{1F600}c", 3)).toBe("ab");
    expect(toSnippet("ab\u{1F600}c", 4)).toBe("ab\u{1F600}");
  });
});

describe("matchContent", () => {
  it("records every matching line with 1-based numbers", () => {
    const result = matchContent("src/A.java", "foo\nbar foo\nnone\n", catalog, 240);

    expect(result.lineCount).toBe(3);
    expect(result.detectors.get("foo")).toEqual([
      { filePath: "src/A.java", line: 1, snippet: "foo" },
      { filePath: "src/A.java", line: 2, snippet: "bar foo" },
    ]);
    expect(result.detectors.has("never")).toBe(false);
    expect(result.antiPatterns.get("bar-rule")).toEqual([
      { filePath: "src/A.java", line: 2, snippet: "bar foo" },
    ]);
  });

  it("counts a line once per detector even with several occurrences", () => {
    const result = matchContent("A.java", "foo foo foo", catalog, 240);
    expect(result.detectors.get("foo")).toHaveLength(1);
  });
});

describe("HitTable", () => {
  it("starts with a zero hit for every detector and rule", () => {
    const table = new HitTable(catalog, 50);

    expect([...table.hits.keys()]).toEqual(["foo", "never"]);
    expect(table.hits.get("never")).toEqual({ key: "never", group: "Words", count: 0, examples: [] });
    expect(table.antiPatterns.get("bar-rule")?.count).toBe(0);
  });

  it("caps examples without capping the count", () => {
    const table = new HitTable(catalog, 2);
    table.add(matchContent("A.java", "foo\nfoo\nfoo\n", catalog, 240));
    table.add(matchContent("B.java", "foo\nfoo\n", catalog, 240));

    const hit = table.hits.get("foo");
    expect(hit?.count).toBe(5);
    expect(hit?.examples).toEqual([
      { filePath: "A.java", line: 1, snippet: "foo" },
      { filePath: "A.java", line: 2, snippet: "foo" },
    ]);
  });

  it("applies the same cap to anti-pattern matches", () => {
    const table = new HitTable(catalog, 1);
    table.add(matchContent("A.java", "bar\nbar\n", catalog, 240));

    const hit = table.antiPatterns.get("bar-rule");
    expect(hit?.count).toBe(2);
    expect(hit?.matches).toEqual([{ filePath: "A.java", line: 1, snippet: "bar" }]);
    expect(hit?.rule.note).toBe("Avoid bar.");
  });
});
