import { text } from "@hostform/design-system";
import { Subject } from "../subject.js";
import {
  HasBinaryContent,
  HasContent,
  HasMode,
  HasOwner,
  IsAbsent,
  IsDirectory,
  IsFile,
  IsSymlink
} from "./assertions.js";

export interface Owner {
  user: string;
  group: string;
}

export interface FsEntryOptions {
  /**
   * Ownership asserted by presence assertions unless an owner assertion
   * already exists. Set on Linux hosts to the invoking user.
   */
  defaultOwner?: Owner;
}

export interface CreateParentsOptions {
  createParents?: boolean;
}

export interface HasLinesOptions extends CreateParentsOptions {
  eol?: string;
  finalNewline?: boolean;
}

export abstract class FsEntry extends Subject {
  constructor(
    readonly path: string,
    readonly options: FsEntryOptions = {}
  ) {
    super();
  }

  protected addPresence(assertion: IsFile | IsDirectory | IsSymlink): this {
    this.addAssertion(assertion);
    const owner = this.options.defaultOwner;
    if (owner && !this.hasAssertion(HasOwner)) {
      this.hasOwner(owner.user, owner.group);
    }
    return this;
  }

  isAbsent(): this {
    return this.addAssertion(new IsAbsent(this.path));
  }

  hasOwner(user?: string, group?: string): this {
    return this.addAssertion(new HasOwner(this.path, user, group));
  }

  hasMode(mode: number): this {
    return this.addAssertion(new HasMode(this.path, mode));
  }

  isSystemFile(): this {
    return this.hasOwner("root", "root");
  }

  describe(): string {
    return `path ${text.code(this.path)}`;
  }
}

export class File extends FsEntry {
  /**
   * Assert that this file is present. With `createParents` (the default)
   * missing parent directories are created as well.
   */
  isPresent({ createParents = true }: CreateParentsOptions = {}): this {
    return this.addPresence(new IsFile(this, createParents));
  }

  hasContent(
    content: string | Uint8Array,
    { createParents = false }: CreateParentsOptions = {}
  ): this {
    if (!this.hasAssertion(IsFile)) {
      this.isPresent({ createParents });
    }
    if (typeof content === "string") {
      this.removeAssertions(HasBinaryContent);
      return this.addAssertion(new HasContent(this.path, content));
    }
    this.removeAssertions(HasContent);
    return this.addAssertion(new HasBinaryContent(this.path, content));
  }

  hasLines(
    lines: readonly string[],
    { eol = "\n", finalNewline = true, createParents = false }: HasLinesOptions = {}
  ): this {
    let joined = lines.join(eol);
    if (finalNewline) {
      joined += eol;
    }
    return this.hasContent(joined, { createParents });
  }
}

export class Directory extends FsEntry {
  isPresent({ createParents = true }: CreateParentsOptions = {}): this {
    return this.addPresence(new IsDirectory(this, createParents));
  }
}

export class Symlink extends FsEntry {
  hasTarget(target: string, { createParents = false }: CreateParentsOptions = {}): this {
    return this.addPresence(new IsSymlink(this, target, createParents));
  }

  override hasMode(mode: number): this {
    throw new Error(`Cannot set mode ${mode.toString(8)} on symlink '${this.path}'`);
  }
}
