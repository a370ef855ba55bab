import { createFsFromVolume, Volume } from "memfs";
import { stripAnsi } from "@hostform/design-system";
import { ApplyLog } from "../apply-log.js";
import { createAccountDatabase } from "../system/accounts.js";
import type { ElevationType } from "../system/elevation.js";
import type { CommandRunner, CommandRunnerResult } from "../system/run-command.js";
import type { ApplyRuntime, FileSystem } from "../types.js";

export const TEST_PASSWD = [
  "root:x:0:0:root:/root:/bin/sh",
  "tester:x:1000:1000:tester:/home/tester:/bin/sh"
].join("\n");

export const TEST_GROUP = [
  "root:x:0:",
  "wheel:x:10:tester",
  "tester:x:1000:"
].join("\n");

export interface RecordedCommand {
  command: string;
  args: string[];
}

export interface TestRuntimeOptions {
  /** Initial files, absolute paths to contents. */
  files?: Record<string, string>;
  shouldModify?: boolean;
  platform?: NodeJS.Platform;
  elevation?: ElevationType;
  env?: Record<string, string | undefined>;
  /** Result for each command; defaults to a successful empty result. */
  respond?: (command: string, args: string[]) => Partial<CommandRunnerResult>;
}

export interface TestRuntime {
  runtime: ApplyRuntime;
  vol: Volume;
  fs: FileSystem;
  commands: RecordedCommand[];
  /** Log lines without colors. */
  output(): string[];
}

export function createTestRuntime(options: TestRuntimeOptions = {}): TestRuntime {
  const vol = Volume.fromJSON({
    "/etc/passwd": TEST_PASSWD,
    "/etc/group": TEST_GROUP,
    "/home/tester": null,
    ...options.files
  });
  const fs = createFsFromVolume(vol).promises as unknown as FileSystem;

  const lines: string[] = [];
  const commands: RecordedCommand[] = [];
  const runner: CommandRunner = async (command, args) => {
    commands.push({ command, args });
    const response = options.respond?.(command, args) ?? {};
    return { stdout: "", stderr: "", exitCode: 0, ...response };
  };

  const runtime: ApplyRuntime = {
    fs,
    log: new ApplyLog((line) => lines.push(line)),
    shouldModify: options.shouldModify ?? true,
    accounts: createAccountDatabase(fs),
    commands: runner,
    platform: options.platform ?? "linux",
    user: { username: "tester", groupname: "tester", homeDir: "/home/tester" },
    elevation: options.elevation ?? "just-in-time",
    env: options.env ?? {}
  };

  return {
    runtime,
    vol,
    fs,
    commands,
    output: () => lines.map(stripAnsi)
  };
}
