import { describe, it, expect, vi } from "vitest";
import { CommandFailedError } from "../errors.js";
import { runChecked, type CommandRunner, type CommandRunnerOptions } from "./run-command.js";

describe("runChecked", () => {
  it("splits the command from its arguments", async () => {
    const runner = vi.fn(
      async (_command: string, _args: string[], _options?: CommandRunnerOptions) => ({
        stdout: "ok",
        stderr: "",
        exitCode: 0
      })
    );

    const result = await runChecked(runner, ["systemctl", "status", "x"], { env: { A: "1" } });

    expect(result.stdout).toBe("ok");
    expect(runner).toHaveBeenCalledWith("systemctl", ["status", "x"], { env: { A: "1" } });
  });

  it("throws with the output on failure", async () => {
    const runner: CommandRunner = async () => ({ stdout: "", stderr: "denied\n", exitCode: 9 });

    const error = await runChecked(runner, ["groupadd", "x"]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CommandFailedError);
    expect(error).toMatchObject({
      exitCode: 9,
      message: "Command failed with exit code 9: groupadd x\ndenied"
    });
  });

  it("rejects an empty command", async () => {
    const runner: CommandRunner = async () => ({ stdout: "", stderr: "", exitCode: 0 });

    await expect(runChecked(runner, [])).rejects.toThrow("Cannot run an empty command");
  });
});
