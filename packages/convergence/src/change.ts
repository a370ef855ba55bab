import type { ApplyLog } from "./apply-log.js";
import type { ApplyRuntime } from "./types.js";

export type DiffKind = "neutral" | "add" | "remove" | "header";

export interface DiffLine {
  readonly kind: DiffKind;
  readonly text: string;
}

export const DiffLine = {
  neutral(content: string): DiffLine {
    return { kind: "neutral", text: `  ${content}` };
  },
  add(content: string): DiffLine {
    return { kind: "add", text: `+ ${content}` };
  },
  remove(content: string): DiffLine {
    return { kind: "remove", text: `- ${content}` };
  },
  header(content: string): DiffLine {
    return { kind: "header", text: content };
  },
  /** Neutral line without the diff gutter. */
  detail(content: string): DiffLine {
    return { kind: "neutral", text: content };
  }
} as const;

/**
 * One state transition detected by an assertion. Changes with an `execute`
 * action are run by the assertion that records them, and only when the
 * runtime allows modification.
 */
export abstract class Change {
  readonly lines: readonly DiffLine[];

  constructor(
    readonly name: string,
    lines: readonly DiffLine[] = []
  ) {
    this.lines = Object.freeze([...lines]);
  }

  execute?(runtime: ApplyRuntime): Promise<void>;

  display(log: ApplyLog): void {
    log.nested(() => {
      log.detail(DiffLine.detail(this.name));
      for (const line of this.lines) {
        log.detail(line);
      }
    });
  }
}
