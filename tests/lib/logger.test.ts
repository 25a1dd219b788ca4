import chalk from "chalk";
import { describe, it, expect, beforeAll, beforeEach } from "vitest";

import { Logger } from "@/lib/logger.js";

import type { LogSink } from "@/lib/logger.js";

interface CapturedSink extends LogSink {
  lines: { out: string[]; err: string[] };
}

function captureSink(): CapturedSink {
  const lines: CapturedSink["lines"] = { out: [], err: [] };
  return {
    lines,
    out: (line) => lines.out.push(line),
    err: (line) => lines.err.push(line),
  };
}

describe("Logger", () => {
  let sink: CapturedSink;
  let log: Logger;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    sink = captureSink();
    log = new Logger();
    log.configure({ sink });
  });

  it("sends info and success to out, everything else to err", () => {
    log.configure({ level: "debug" });
    log.debug("d");
    log.info("i");
    log.warn("w");
    log.error("e");
    log.success("s");

    expect(sink.lines.out).toEqual(["i", "s"]);
    expect(sink.lines.err).toEqual(["d", "w", "e"]);
  });

  it("drops messages below the configured level", () => {
    log.configure({ level: "warn" });
    log.debug("d");
    log.info("i");
    log.warn("w");

    expect(sink.lines.out).toEqual([]);
    expect(sink.lines.err).toEqual(["w"]);
  });

  it("logs nothing when silent", () => {
    log.configure({ level: "silent" });
    log.error("e");
    expect(sink.lines.err).toEqual([]);
  });

  it("prefixes child messages", () => {
    const child = log.child("Scanner").child("Walker");
    child.info("hello");
    expect(sink.lines.out).toEqual(["[Scanner:Walker] hello"]);
  });

  it("propagates level and sink changes to children", () => {
    const child = log.child("Scanner");
    const other = captureSink();
    log.configure({ level: "error", sink: other });

    child.warn("hidden");
    child.error("shown");

    expect(child.getLevel()).toBe("error");
    expect(sink.lines.err).toEqual([]);
    expect(other.lines.err).toEqual(["[Scanner] shown"]);
  });
});
