import { describe, it, expect } from "vitest";

import {
  defaultOutputPath,
  formatTimestamp,
  resolveScanConfig,
} from "@/cli/config.js";
import { ValidationError } from "@/lib/errors.js";

const NOW = new Date(2026, 9, 19, 8, 5, 3);
const CONTEXT = { env: {}, now: NOW, cwd: "/work" };

describe("formatTimestamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(formatTimestamp(NOW)).toBe("20261019_080503");
  });
});

describe("defaultOutputPath", () => {
  it("uses the format's extension", () => {
    expect(defaultOutputPath(NOW, "markdown")).toBe("tmp/scan-20261019_080503.md");
    expect(defaultOutputPath(NOW, "json")).toBe("tmp/scan-20261019_080503.json");
  });
});

describe("resolveScanConfig", () => {
  it("applies defaults", () => {
    const result = resolveScanConfig({}, CONTEXT);

    expect(result).toEqual({
      success: true,
      data: {
        root: "/work",
        out: "/work/tmp/scan-20261019_080503.md",
        format: "markdown",
        catalogPath: undefined,
        exampleCap: 50,
        snippetLength: 240,
        extensions: undefined,
        excludeDirs: [],
        followSymlinks: true,
      },
    });
  });

  it("takes the output path from OUT", () => {
    const result = resolveScanConfig({}, { ...CONTEXT, env: { OUT: "reports/style.md" } });
    expect(result.success && result.data.out).toBe("/work/reports/style.md");
  });

  it("ignores an empty OUT", () => {
    const result = resolveScanConfig({}, { ...CONTEXT, env: { OUT: "" } });
    expect(result.success && result.data.out).toBe("/work/tmp/scan-20261019_080503.md");
  });

  it("prefers --out over OUT", () => {
    const result = resolveScanConfig({ out: "/abs/report.md" }, { ...CONTEXT, env: { OUT: "ignored.md" } });
    expect(result.success && result.data.out).toBe("/abs/report.md");
  });

  it("names JSON reports by default", () => {
    const result = resolveScanConfig({ format: "json" }, CONTEXT);
    expect(result.success && result.data.out).toBe("/work/tmp/scan-20261019_080503.json");
  });

  it("resolves root and catalog against the working directory", () => {
    const result = resolveScanConfig({ root: "services/api", catalog: "rules.yml" }, CONTEXT);
    if (!result.success) throw result.error;
    expect(result.data.root).toBe("/work/services/api");
    expect(result.data.catalogPath).toBe("/work/rules.yml");
  });

  it("parses numeric options given as strings", () => {
    const result = resolveScanConfig({ exampleCap: "5", snippetLength: "80" }, CONTEXT);
    if (!result.success) throw result.error;
    expect(result.data.exampleCap).toBe(5);
    expect(result.data.snippetLength).toBe(80);
  });

  it("normalizes extension and exclusion lists", () => {
    const result = resolveScanConfig(
      { extensions: "java, .KT,", exclude: "node_modules, build", followSymlinks: false },
      CONTEXT
    );
    if (!result.success) throw result.error;
    expect(result.data.extensions).toEqual([".java", ".kt"]);
    expect(result.data.excludeDirs).toEqual(["node_modules", "build"]);
    expect(result.data.followSymlinks).toBe(false);
  });

  it("drops options it does not know", () => {
    const result = resolveScanConfig({ quiet: true, verbose: false }, CONTEXT);
    expect(result.success).toBe(true);
  });

  it.each([
    [{ exampleCap: "0" }, "Invalid option --example-cap: "],
    [{ exampleCap: "many" }, "Invalid option --example-cap: "],
    [{ snippetLength: "-1" }, "Invalid option --snippet-length: "],
    [{ format: "html" }, "Invalid option --format: "],
    [{ extensions: "j@va" }, "Invalid option --extensions: "],
  ])("rejects %j", (options, message) => {
    const result = resolveScanConfig(options, CONTEXT);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.message.startsWith(message)).toBe(true);
  });
});
