import { EnsureFailedError } from "./errors.js";
import { Handler, type HandlerRegistry } from "./handler.js";
import type { Subject } from "./subject.js";
import type { ApplyRuntime } from "./types.js";

/**
 * Per-role state: the handlers registered while the role is configured and
 * the runtime its subjects apply through.
 */
export class RoleContext implements HandlerRegistry {
  private handlers: Handler[] = [];

  constructor(readonly runtime: ApplyRuntime) {}

  /** Make every assertion of `subjects` true, or pretend to in dry-run mode. */
  async do(subjects: readonly Subject[]): Promise<void> {
    for (const subject of subjects) {
      await subject.apply(this.runtime);
    }
  }

  /**
   * Check `subjects` without modifying anything. Any drift is an error.
   */
  async ensure(subjects: readonly Subject[]): Promise<void> {
    const runtime: ApplyRuntime = {
      ...this.runtime,
      shouldModify: false,
      log: this.runtime.log.strict()
    };
    const { log } = runtime;
    await log.within(async () => {
      log.noChange("assert that");
      for (const subject of subjects) {
        await subject.apply(runtime);
        if (subject.changed()) {
          throw new EnsureFailedError(subject.getDescription());
        }
      }
    });
  }

  handler(...subjects: Subject[]): Handler {
    const handler = new Handler(subjects, { registry: this });
    this.addHandler(handler);
    return handler;
  }

  addHandler(handler: Handler): void {
    this.handlers.push(handler);
  }

  removeHandler(handler: Handler): void {
    this.handlers = this.handlers.filter((existing) => existing !== handler);
  }

  registeredHandlers(): readonly Handler[] {
    return this.handlers;
  }

  async runHandlers(): Promise<void> {
    for (const handler of [...this.handlers]) {
      await handler.run(this.runtime);
    }
  }
}
