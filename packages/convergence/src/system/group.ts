import { text } from "@hostform/design-system";
import { Assertion } from "../assertion.js";
import { Change, DiffLine } from "../change.js";
import { UnsupportedPlatformError } from "../errors.js";
import { Subject } from "../subject.js";
import type { ApplyRuntime } from "../types.js";
import { elevatedCommand } from "./elevation.js";
import { runChecked } from "./run-command.js";

export class Group extends Subject {
  constructor(readonly name: string) {
    super();
  }

  isPresent(): this {
    return this.addAssertion(new GroupIsPresent(this.name));
  }

  describe(): string {
    return `group ${text.subject(this.name)}`;
  }
}

export class GroupIsPresent extends Assertion {
  constructor(readonly group: string) {
    super("is present");
  }

  async apply(runtime: ApplyRuntime): Promise<void> {
    if (runtime.platform !== "linux") {
      throw new UnsupportedPlatformError("Group management", runtime.platform);
    }
    if (!(await runtime.accounts.hasGroup(this.group))) {
      await this.record(new GroupCreated(this.group), runtime);
    }
    this.display(runtime.log);
  }
}

export class GroupCreated extends Change {
  constructor(readonly group: string) {
    super("created", [DiffLine.add(group)]);
  }

  async execute({ commands, elevation, env }: ApplyRuntime): Promise<void> {
    await runChecked(commands, elevatedCommand(elevation, ["groupadd", this.group]), { env });
  }
}
