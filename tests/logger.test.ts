import { afterEach, describe, expect, it } from "vitest";
import { getLogger, setupLogging } from "../src/infra/logging/logger.js";

class CapturingWriter {
  readonly lines: string[] = [];

  write(line: string): boolean {
    this.lines.push(line);
    return true;
  }
}

describe("logger", () => {
  afterEach(() => {
    setupLogging({}, process.stderr);
  });

  it("writes level, module, message and data", () => {
    const writer = new CapturingWriter();
    setupLogging(
      { level: "debug", useColors: false, showTimestamps: false, showModule: true },
      writer,
    );

    getLogger("x").warn("careful", { a: 1 });

    expect(writer.lines).toEqual(['WARN  | [x] | careful {"a":1}\n']);
  });

  it("drops messages below the configured level", () => {
    const writer = new CapturingWriter();
    setupLogging({ level: "warn", useColors: false, showTimestamps: false }, writer);

    const logger = getLogger("x");
    logger.info("hidden");
    logger.error("shown", {});

    expect(writer.lines).toEqual(["ERROR | shown\n"]);
  });

  it("colors the level label", () => {
    const writer = new CapturingWriter();
    setupLogging({ useColors: true, showTimestamps: false }, writer);

    getLogger("x").info("ready");

    expect(writer.lines).toEqual(["\x1b[32mINFO \x1b[0m | ready\n"]);
  });

  it("colors only a TTY stderr when colors are left unset", () => {
    const writer = new CapturingWriter();
    setupLogging({ useColors: undefined, showTimestamps: false }, writer);

    getLogger("x").info("ready");

    expect(writer.lines).toEqual([
      process.stderr.isTTY === true ? "\x1b[32mINFO \x1b[0m | ready\n" : "INFO  | ready\n",
    ]);
  });

  it("prefixes an ISO timestamp", () => {
    const writer = new CapturingWriter();
    setupLogging({ useColors: false }, writer);

    getLogger("x").info("ready");

    expect(writer.lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \| INFO  \| ready\n$/);
  });
});
