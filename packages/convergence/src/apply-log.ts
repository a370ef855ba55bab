import chalk from "chalk";
import { stderrLines, symbols, type LineEmitter } from "@hostform/design-system";
import type { DiffLine } from "./change.js";

/**
 * The indented tree printed while subjects are applied.
 *
 *   [*] path /etc/motd
 *         ✓ is file
 *         ⟳ has content
 *           content changed
 */
export class ApplyLog {
  constructor(
    protected readonly emit: LineEmitter = stderrLines,
    protected depth = 0
  ) {}

  /** Run `fn` one level deeper. */
  async within<T>(fn: () => Promise<T>): Promise<T> {
    this.depth += 1;
    try {
      return await fn();
    } finally {
      this.depth -= 1;
    }
  }

  nested(fn: () => void): void {
    this.depth += 1;
    try {
      fn();
    } finally {
      this.depth -= 1;
    }
  }

  noChange(message: string): void {
    this.emit(`[${chalk.green(symbols.noChange)}] ${this.indent()}${message}`);
  }

  change(message: string): void {
    this.emit(`[${chalk.yellow(symbols.change)}] ${this.indent()}${message}`);
  }

  assertionPass(name: string): void {
    this.emit(`${this.indent()}  ${chalk.green(symbols.pass)} ${name}`);
  }

  assertionChange(name: string): void {
    this.emit(`${this.indent()}  ${chalk.yellow(symbols.pending)} ${name}`);
  }

  assertionFail(name: string): void {
    this.emit(`${this.indent()}  ${chalk.red(symbols.fail)} ${name}`);
  }

  detail(line: DiffLine): void {
    this.emit(`    ${this.indent()}${colorize(line)}`);
  }

  /**
   * A log for `ensure`: any change is rendered as a failure and change
   * details are dropped.
   */
  strict(): ApplyLog {
    return new StrictApplyLog(this.emit, this.depth);
  }

  protected indent(): string {
    return "  ".repeat(this.depth);
  }
}

class StrictApplyLog extends ApplyLog {
  override change(message: string): void {
    this.emit(`[${chalk.red(symbols.change)}] ${this.indent()}${message}`);
  }

  override assertionChange(name: string): void {
    this.assertionFail(name);
  }

  override detail(line: DiffLine): void {
    void line;
  }

  override strict(): ApplyLog {
    return this;
  }
}

function colorize(line: DiffLine): string {
  switch (line.kind) {
    case "add":
      return chalk.green(line.text);
    case "remove":
      return chalk.red(line.text);
    case "header":
      return chalk.cyan(line.text);
    case "neutral":
      return line.text;
  }
}
