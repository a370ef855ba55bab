import type { Assertion } from "./assertion.js";
import type { Handler } from "./handler.js";
import type { ApplyRuntime } from "./types.js";

export type AssertionKind<T extends Assertion> = abstract new (...args: never[]) => T;

export abstract class Subject {
  private assertions: Assertion[] = [];
  private readonly declared: Subject[] = [];
  private synthesized: Subject[] = [];
  private description: string | undefined;

  abstract describe(): string;

  async apply(runtime: ApplyRuntime): Promise<void> {
    const { log } = runtime;
    await log.within(async () => {
      log.noChange(this.getDescription());

      this.synthesized = [];
      for (const assertion of this.assertions) {
        assertion.reset();
      }
      for (const assertion of [...this.assertions]) {
        await assertion.prepare(runtime);
      }

      for (const prerequisite of [...this.synthesized, ...this.declared]) {
        await prerequisite.apply(runtime);
      }

      for (const assertion of this.assertions) {
        await assertion.apply(runtime);
      }
    });
  }

  changed(): boolean {
    return (
      this.assertions.some((assertion) => assertion.changed()) ||
      this.prerequisites().some((prerequisite) => prerequisite.changed())
    );
  }

  /** Adds an assertion, replacing a previous one of the same kind. */
  addAssertion(assertion: Assertion): this {
    this.assertions = this.assertions.filter(
      (existing) => existing.constructor !== assertion.constructor
    );
    this.assertions.push(assertion);
    return this;
  }

  /** Adds an assertion next to existing ones of the same kind. */
  protected appendAssertion(assertion: Assertion): this {
    this.assertions.push(assertion);
    return this;
  }

  hasAssertion<T extends Assertion>(kind: AssertionKind<T>): boolean {
    return this.assertions.some((assertion) => assertion.constructor === kind);
  }

  getAssertion<T extends Assertion>(kind: AssertionKind<T>): T | undefined {
    return this.assertions.find(
      (assertion): assertion is T => assertion.constructor === kind
    );
  }

  getLastAssertion<T extends Assertion>(kind: AssertionKind<T>): T | undefined {
    return this.assertions.findLast(
      (assertion): assertion is T => assertion.constructor === kind
    );
  }

  removeAssertions<T extends Assertion>(kind: AssertionKind<T>): this {
    this.assertions = this.assertions.filter(
      (assertion) => assertion.constructor !== kind
    );
    return this;
  }

  getAssertions(): readonly Assertion[] {
    return this.assertions;
  }

  /** Declares a subject that is applied before this subject's own assertions. */
  addPrerequisite(subject: Subject): this {
    this.declared.push(subject);
    return this;
  }

  /**
   * Inserts a prerequisite computed during `prepare`. Synthesized
   * prerequisites are dropped at the start of every apply.
   */
  synthesizePrerequisite(subject: Subject): void {
    this.synthesized.push(subject);
  }

  prerequisites(): readonly Subject[] {
    return [...this.synthesized, ...this.declared];
  }

  onChange(handler: Handler): this {
    handler.listen(this);
    return this;
  }

  /** Overrides the default description of this subject. */
  annotate(description: string): this {
    this.description = description;
    return this;
  }

  getDescription(): string {
    return this.description ?? this.describe();
  }
}
