import type { ApplyLog } from "./apply-log.js";
import type { Change } from "./change.js";
import type { ApplyRuntime } from "./types.js";

export abstract class Assertion {
  private changes: Change[] = [];

  constructor(readonly name: string) {}

  /** Changes recorded by the most recent evaluation. */
  get recordedChanges(): readonly Change[] {
    return this.changes;
  }

  changed(): boolean {
    return this.changes.length > 0;
  }

  reset(): void {
    this.changes = [];
  }

  /**
   * Called on every assertion of a subject before anything is applied.
   * The only place where prerequisites may be synthesized.
   */
  async prepare(runtime: ApplyRuntime): Promise<void> {
    void runtime;
  }

  abstract apply(runtime: ApplyRuntime): Promise<void>;

  protected async record(change: Change, runtime: ApplyRuntime): Promise<void> {
    this.changes.push(change);
    if (runtime.shouldModify && change.execute) {
      await change.execute(runtime);
    }
  }

  /** Passed when nothing was recorded, changed otherwise. */
  protected display(log: ApplyLog): void {
    if (this.changed()) {
      this.displayChanged(log);
    } else {
      this.displayPassed(log);
    }
  }

  protected displayPassed(log: ApplyLog): void {
    log.nested(() => log.assertionPass(this.name));
  }

  protected displayChanged(log: ApplyLog): void {
    log.nested(() => {
      log.assertionChange(this.name);
      for (const change of this.changes) {
        change.display(log);
      }
    });
  }

  protected displayFailed(log: ApplyLog): void {
    log.nested(() => {
      log.assertionFail(this.name);
      for (const change of this.changes) {
        change.display(log);
      }
    });
  }
}
