import { describe, it, expect } from "vitest";
import { stripAnsi } from "@hostform/design-system";
import { ApplyLog } from "./apply-log.js";
import { Change, DiffLine } from "./change.js";

class Renamed extends Change {
  constructor() {
    super("renamed", [DiffLine.remove("old"), DiffLine.add("new")]);
  }
}

describe("DiffLine", () => {
  it("prefixes lines with their gutter", () => {
    expect(DiffLine.neutral("x")).toEqual({ kind: "neutral", text: "  x" });
    expect(DiffLine.add("x")).toEqual({ kind: "add", text: "+ x" });
    expect(DiffLine.remove("x")).toEqual({ kind: "remove", text: "- x" });
    expect(DiffLine.header("@@ -1 +1 @@")).toEqual({ kind: "header", text: "@@ -1 +1 @@" });
  });
});

describe("Change", () => {
  it("displays its name above its diff lines", () => {
    const lines: string[] = [];
    const log = new ApplyLog((line) => lines.push(stripAnsi(line)));

    new Renamed().display(log);

    expect(lines).toEqual(["      renamed", "      - old", "      + new"]);
  });

  it("cannot be mutated", () => {
    const change = new Renamed();

    expect(Object.isFrozen(change.lines)).toBe(true);
    expect(change.execute).toBeUndefined();
  });
});
