import type { Subject } from "./subject.js";
import type { ApplyRuntime } from "./types.js";

export interface HandlerRegistry {
  addHandler(handler: Handler): void;
  removeHandler(handler: Handler): void;
}

export type HandlerState = "listening" | "fired" | "skipped";

export interface HandlerOptions {
  registry?: HandlerRegistry;
  /** Generated handlers are not reported when skipped. */
  generated?: boolean;
}

/**
 * Applies its subjects at role teardown when any subject it listens to
 * changed. Fires at most once.
 */
export class Handler {
  private readonly listened: Subject[] = [];
  private readonly calls: readonly Subject[];
  private readonly registry: HandlerRegistry | undefined;
  readonly generated: boolean;
  private currentState: HandlerState = "listening";

  constructor(subjects: readonly Subject[], options: HandlerOptions = {}) {
    this.calls = [...subjects];
    this.registry = options.registry;
    this.generated = options.generated ?? false;
  }

  get state(): HandlerState {
    return this.currentState;
  }

  listen(subject: Subject): void {
    this.listened.push(subject);
  }

  remove(): void {
    this.registry?.removeHandler(this);
  }

  async run(runtime: ApplyRuntime): Promise<void> {
    if (this.currentState !== "listening") {
      return;
    }
    const { log } = runtime;

    if (this.listened.some((subject) => subject.changed())) {
      this.currentState = "fired";
      log.change("executing handler for:");
      this.summarize(runtime);
      for (const subject of this.calls) {
        await subject.apply(runtime);
      }
      return;
    }

    this.currentState = "skipped";
    if (!this.generated) {
      log.noChange("skipped handler for:");
      this.summarize(runtime);
    }
  }

  private summarize({ log }: ApplyRuntime): void {
    log.nested(() => {
      for (const subject of this.listened) {
        if (subject.changed()) {
          log.change(subject.getDescription());
        } else {
          log.noChange(subject.getDescription());
        }
      }
    });
  }
}
