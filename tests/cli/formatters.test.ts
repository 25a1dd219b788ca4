import chalk from "chalk";
import { describe, it, expect, beforeAll } from "vitest";

import {
  formatCatalog,
  formatError,
  formatJson,
  formatMarkdown,
  formatTerminal,
  isValidOutputFormat,
} from "@/cli/formatters.js";
import { compileCatalog } from "@/catalog/loader.js";
import { unwrap } from "@/lib/result.js";

const catalog = unwrap(
  compileCatalog({
    name: "sample",
    title: "Sample Catalog",
    extensions: [".java"],
    groups: [
      {
        name: "Injection",
        detectors: [
          { key: "di_field", pattern: "@Inject\\s+private", description: "Field injection" },
          { key: "di_constructor", pattern: "public\\s+\\w+\\(" },
        ],
      },
      { name: "Logging", detectors: [{ key: "slf4j", pattern: "LoggerFactory" }] },
    ],
    antiPatterns: [{ id: "system-out", pattern: "System\\.out", note: "Use a logger." }],
  })
);

describe("Catalog formatters", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  describe("formatTerminal", () => {
    it("lists groups with their detector counts", () => {
      const output = formatTerminal(catalog);
      const lines = output.split("\n");

      expect(lines[0]).toBe("Sample Catalog");
      expect(lines[1]).toBe("Catalog: sample");
      expect(lines[2]).toBe("Extensions: .java");
      expect(output).toContain("\nInjection (2)\n");
      expect(output).toContain("  di_field /@Inject\\s+private/\n     Field injection\n");
      expect(output).toContain("\nAnti-patterns (1)\n");
      expect(lines[lines.length - 1]).toBe("2 groups | 3 detectors | 1 anti-patterns");
    });
  });

  describe("formatJson", () => {
    it("writes patterns as source text", () => {
      const parsed: unknown = JSON.parse(formatJson(catalog));

      expect(parsed).toEqual({
        name: "sample",
        title: "Sample Catalog",
        extensions: [".java"],
        groups: [
          {
            name: "Injection",
            detectors: [
              { key: "di_field", pattern: "@Inject\\s+private" },
              { key: "di_constructor", pattern: "public\\s+\\w+\\(" },
            ],
          },
          { name: "Logging", detectors: [{ key: "slf4j", pattern: "LoggerFactory" }] },
        ],
        antiPatterns: [{ id: "system-out", pattern: "System\\.out", note: "Use a logger." }],
        topics: [],
      });
    });
  });

  describe("formatMarkdown", () => {
    it("renders a section per group", () => {
      const output = formatMarkdown(catalog);

      expect(output.startsWith("# Sample Catalog\n")).toBe(true);
      expect(output).toContain("## Logging\n\n- **slf4j**: `LoggerFactory`\n");
      expect(output).toContain("- **system-out**: `System\\.out` (Use a logger.)");
    });
  });

  describe("formatCatalog", () => {
    it("dispatches on the output format", () => {
      expect(formatCatalog(catalog, "json")).toBe(formatJson(catalog));
      expect(formatCatalog(catalog, "markdown")).toBe(formatMarkdown(catalog));
      expect(formatCatalog(catalog, "terminal")).toBe(formatTerminal(catalog));
    });
  });

  describe("isValidOutputFormat", () => {
    it("accepts known formats only", () => {
      expect(isValidOutputFormat("terminal")).toBe(true);
      expect(isValidOutputFormat("markdown")).toBe(true);
      expect(isValidOutputFormat("sarif")).toBe(false);
    });
  });
});

describe("Message formatters", () => {
  it("formats errors as one line", () => {
    expect(formatError(new Error("boom"))).toBe("Error: boom");
  });
});
