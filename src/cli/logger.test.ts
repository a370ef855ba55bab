import { describe, it, expect } from "vitest";
import { TemplateRenderError } from "../project/template.js";
import { createLoggerFactory } from "./logger.js";

function createTestLogger(verbose = false) {
  const lines: string[] = [];
  const logger = createLoggerFactory((line) => lines.push(line)).create({
    verbose,
    scope: "apply"
  });
  return { logger, lines };
}

describe("ScopedLogger", () => {
  it("prefixes messages with the scope in verbose mode", () => {
    const quiet = createTestLogger();
    const verbose = createTestLogger(true);

    quiet.logger.info("Applying target base");
    verbose.logger.info("Applying target base");

    expect(quiet.lines).toEqual(["Applying target base"]);
    expect(verbose.lines).toEqual(["[apply] Applying target base"]);
  });

  it("drops verbose messages unless verbose", () => {
    const { logger, lines } = createTestLogger();

    logger.verbose("details");

    expect(lines).toEqual([]);
  });

  it("logs exceptions with their type", () => {
    const { logger, lines } = createTestLogger();

    logger.logException(new TypeError("boom"), "apply role shell");

    expect(lines).toEqual(["Error during apply role shell: boom", "    TypeError: boom"]);
  });

  it("points at the failing template location", () => {
    const { logger, lines } = createTestLogger();
    const error = new TemplateRenderError(
      "Error rendering 'motd.mustache': 'vars.port' is undefined",
      { file: "motd.mustache", line: 2, column: 6, source: "port={{vars.port}}" }
    );

    logger.logException(error, "apply role motd");

    expect(lines).toEqual([
      "Error during apply role motd: Error rendering 'motd.mustache': 'vars.port' is undefined",
      "    In 'motd.mustache' at line 2, column 6:",
      "    ",
      "      port={{vars.port}}",
      "           ^"
    ]);
  });

  it("adds the stack in verbose mode", () => {
    const { logger, lines } = createTestLogger(true);
    const error = new Error("boom");
    error.stack = "Error: boom\n    at configure (roles/shell.ts:3:9)";

    logger.logException(error, "apply role shell");

    expect(lines).toEqual([
      "[apply] Error during apply role shell: boom",
      "    Error: boom",
      "      at configure (roles/shell.ts:3:9)"
    ]);
  });

  it("keeps the context in child loggers", () => {
    const { logger } = createTestLogger(true);

    expect(logger.child({ scope: "role" }).context).toEqual({
      dryRun: false,
      verbose: true,
      scope: "role"
    });
  });
});
