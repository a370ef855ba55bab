import { describe, it, expect } from "vitest";
import { createTestRuntime } from "../testing/index.js";
import { RoleContext } from "../role-context.js";
import { SystemdService, SystemdServiceError } from "./systemd.js";

function respondWith(properties: Record<string, string>, statusCode = 0) {
  return (_command: string, args: string[]) => {
    if (args.includes("status")) {
      return { exitCode: statusCode };
    }
    const property = args[args.indexOf("--property") + 1] ?? "";
    return { stdout: `${properties[property] ?? ""}\n` };
  };
}

describe("SystemdService", () => {
  it("starts an inactive system service with elevation", async () => {
    const { runtime, commands } = createTestRuntime({
      respond: respondWith({ ActiveState: "inactive" })
    });
    const context = new RoleContext(runtime);
    const service = new SystemdService("nginx.service", {
      handlers: context,
      userConfigHome: "/home/tester/.config"
    }).isStarted();

    await context.do([service]);

    expect(commands).toEqual([
      { command: "systemctl", args: ["status", "nginx.service"] },
      {
        command: "systemctl",
        args: ["show", "--value", "--property", "ActiveState", "nginx.service"]
      },
      { command: "sudo", args: ["systemctl", "start", "nginx.service"] }
    ]);
  });

  it("passes for an enabled service", async () => {
    const { runtime, commands } = createTestRuntime({
      respond: respondWith({ UnitFileState: "enabled" })
    });
    const context = new RoleContext(runtime);
    const service = new SystemdService("nginx.service", {
      handlers: context,
      userConfigHome: "/home/tester/.config"
    }).isEnabled();

    await context.do([service]);

    expect(service.changed()).toBe(false);
    expect(commands).toHaveLength(2);
  });

  it("fails for an unknown state", async () => {
    const { runtime } = createTestRuntime({
      respond: respondWith({ ActiveState: "activating" })
    });
    const context = new RoleContext(runtime);
    const service = new SystemdService("nginx.service", {
      handlers: context,
      userConfigHome: "/home/tester/.config"
    }).isStarted();

    await expect(context.do([service])).rejects.toThrow(
      "Unknown state for service 'nginx.service': ActiveState=activating"
    );
  });

  it("fails for a missing unit", async () => {
    const { runtime } = createTestRuntime({ respond: respondWith({}, 4) });
    const context = new RoleContext(runtime);
    const service = new SystemdService("ghost.service", {
      handlers: context,
      userConfigHome: "/home/tester/.config"
    }).isStarted();

    await expect(context.do([service])).rejects.toBeInstanceOf(SystemdServiceError);
  });

  it("runs user units as the invoking user when elevated", async () => {
    const { runtime, commands } = createTestRuntime({
      elevation: "elevated",
      respond: respondWith({ ActiveState: "inactive" })
    });
    const context = new RoleContext(runtime);
    const service = new SystemdService("sync.service", {
      scope: "user",
      handlers: context,
      userConfigHome: "/home/tester/.config"
    }).isStarted();

    await context.do([service]);

    expect(commands.at(-1)).toEqual({
      command: "sudo",
      args: ["--preserve-env", "--user", "tester", "systemctl", "--user", "start", "sync.service"]
    });
  });

  it("reloads and restarts through a generated handler when the unit file changes", async () => {
    const { runtime, vol, commands } = createTestRuntime();
    const context = new RoleContext(runtime);
    const service = new SystemdService("sync.service", {
      scope: "user",
      handlers: context,
      userConfigHome: "/home/tester/.config"
    }).file((file) => {
      file.hasContent("[Unit]\n", { createParents: true }).restartsService();
    });

    expect(context.registeredHandlers()).toHaveLength(1);

    await context.do([service]);
    await context.runHandlers();

    expect(vol.readFileSync("/home/tester/.config/systemd/user/sync.service", "utf8")).toBe(
      "[Unit]\n"
    );
    expect(commands).toEqual([
      { command: "systemctl", args: ["--user", "daemon-reload"] },
      { command: "systemctl", args: ["--user", "restart", "sync.service"] }
    ]);
  });

  it("leaves no handler when reloading and restarting are both off", () => {
    const { runtime } = createTestRuntime();
    const context = new RoleContext(runtime);

    new SystemdService("sync.service", {
      handlers: context,
      userConfigHome: "/home/tester/.config"
    }).file((file) => {
      file.doesNotReloadDaemon();
    });

    expect(context.registeredHandlers()).toEqual([]);
  });
});
