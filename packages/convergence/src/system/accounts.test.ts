import { describe, it, expect } from "vitest";
import { createTestRuntime } from "../testing/index.js";
import { UnknownAccountError } from "../errors.js";
import { createAccountDatabase, parseAccountFile } from "./accounts.js";

describe("parseAccountFile", () => {
  it("reads names and ids, skipping comments and blanks", () => {
    const content = "# users\nroot:x:0:0::/root:/bin/sh\n\nbroken\nalice:x:1001:1001::/home/alice:/bin/sh\n";

    expect(parseAccountFile(content)).toEqual([
      { name: "root", id: 0 },
      { name: "alice", id: 1001 }
    ]);
  });
});

describe("createAccountDatabase", () => {
  it("resolves names to ids and back", async () => {
    const { fs } = createTestRuntime();
    const accounts = createAccountDatabase(fs);

    expect(await accounts.userId("tester")).toBe(1000);
    expect(await accounts.groupId("wheel")).toBe(10);
    expect(await accounts.userName(0)).toBe("root");
    expect(await accounts.groupName(4242)).toBe("4242");
    expect(await accounts.hasGroup("docker")).toBe(false);
  });

  it("rejects unknown names", async () => {
    const { fs } = createTestRuntime();
    const accounts = createAccountDatabase(fs);

    await expect(accounts.userId("nobody")).rejects.toBeInstanceOf(UnknownAccountError);
  });

  it("treats missing databases as empty", async () => {
    const { fs } = createTestRuntime();
    const accounts = createAccountDatabase(fs, { groupPath: "/nowhere/group" });

    expect(await accounts.hasGroup("root")).toBe(false);
  });
});
