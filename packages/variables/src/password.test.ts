import { describe, it, expect, vi } from "vitest";
import type { CommandRunnerOptions } from "@hostform/convergence";
import { commandPasswordLoader, createPasswordProvider } from "./password.js";

describe("createPasswordProvider", () => {
  it("loads the password once", async () => {
    const loader = vi.fn(async () => "test-secret");
    const provider = createPasswordProvider(loader);

    expect(await provider.get()).toBe("test-secret");
    expect(await provider.get()).toBe("test-secret");
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it("asks again after a failed load", async () => {
    let attempts = 0;
    const provider = createPasswordProvider(async () => {
      attempts += 1;
      if (attempts === 1) {
        throw new Error("cancelled");
      }
      return "test-secret";
    });

    await expect(provider.get()).rejects.toThrow("cancelled");
    expect(await provider.get()).toBe("test-secret");
    expect(attempts).toBe(2);
  });
});

describe("commandPasswordLoader", () => {
  it("returns stdout without the trailing newline", async () => {
    const commands = vi.fn(
      async (_command: string, _args: string[], _options?: CommandRunnerOptions) => ({
        stdout: "test-secret\r\n",
        stderr: "",
        exitCode: 0
      })
    );
    const load = commandPasswordLoader(["pass", "show", "hostform"], {
      commands,
      elevation: "just-in-time",
      username: "tester"
    });

    expect(await load()).toBe("test-secret");
    expect(commands).toHaveBeenCalledWith("pass", ["show", "hostform"], { env: undefined });
  });

  it("runs as the invoking user when elevated", async () => {
    const commands = vi.fn(
      async (_command: string, _args: string[], _options?: CommandRunnerOptions) => ({
        stdout: "test-secret",
        stderr: "",
        exitCode: 0
      })
    );
    const load = commandPasswordLoader(["pass", "show", "hostform"], {
      commands,
      elevation: "elevated",
      username: "tester"
    });

    await load();

    expect(commands).toHaveBeenCalledWith(
      "sudo",
      ["--preserve-env", "--user", "tester", "pass", "show", "hostform"],
      { env: undefined }
    );
  });

  it("fails when the command fails", async () => {
    const load = commandPasswordLoader(["false"], {
      commands: async () => ({ stdout: "", stderr: "no password", exitCode: 1 }),
      elevation: "none",
      username: "tester"
    });

    await expect(load()).rejects.toThrow();
  });
});
