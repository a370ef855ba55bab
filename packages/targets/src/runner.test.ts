import { describe, it, expect } from "vitest";
import { File, type RoleContext } from "@hostform/convergence";
import { createTestRuntime } from "@hostform/convergence/testing";
import { stripAnsi } from "@hostform/design-system";
import { RoleRegistry, type RoleDefinition } from "./role.js";
import { TargetRunner } from "./runner.js";
import { TargetRegistry } from "./target.js";

interface TestScope {
  role: string;
  context: RoleContext;
}

function createRunner(roles: RoleDefinition<TestScope>[]) {
  const testRuntime = createTestRuntime();
  const messages: string[] = [];
  const failures: string[] = [];
  const runner = new TargetRunner<TestScope>({
    roles: new RoleRegistry(roles),
    runtime: testRuntime.runtime,
    logger: {
      info: (message) => messages.push(stripAnsi(message)),
      logException: (error, operation) => failures.push(`${operation}: ${error.message}`)
    },
    createScope: (role, context) => ({ role, context })
  });
  return { runner, messages, failures, ...testRuntime };
}

function recordingRole(name: string, applied: string[]): RoleDefinition<TestScope> {
  return {
    name,
    configure: () => {
      applied.push(name);
    }
  };
}

describe("TargetRunner", () => {
  it("runs required targets before the target's own roles", async () => {
    const applied: string[] = [];
    const targets = new TargetRegistry();
    targets.target("laptop").dependsOn("base").hasRoles("desktop");
    targets.target("base").hasRoles("shell", "git");
    const { runner, messages } = createRunner(
      ["shell", "git", "desktop"].map((name) => recordingRole(name, applied))
    );

    const outcomes = await runner.execute(targets.get("laptop"));

    expect(applied).toEqual(["shell", "git", "desktop"]);
    expect(messages).toEqual([
      "Target laptop requires base",
      "Applying target base",
      "Applying target laptop"
    ]);
    expect(outcomes.map((outcome) => `${outcome.target}/${outcome.role}:${outcome.status}`)).toEqual([
      "base/shell:applied",
      "base/git:applied",
      "laptop/desktop:applied"
    ]);
  });

  it("runs a diamond dependency once per path", async () => {
    const applied: string[] = [];
    const targets = new TargetRegistry();
    targets.target("top").dependsOn("left", "right");
    targets.target("left").dependsOn("base");
    targets.target("right").dependsOn("base");
    targets.target("base").hasRoles("shell");
    const { runner } = createRunner([recordingRole("shell", applied)]);

    await runner.execute(targets.get("top"));

    expect(applied).toEqual(["shell", "shell"]);
  });

  it("honors the role limit and skipped roles", async () => {
    const applied: string[] = [];
    const targets = new TargetRegistry();
    targets.target("base").hasRoles("shell", "git", "editor");
    const { runner } = createRunner(
      ["shell", "git", "editor"].map((name) => recordingRole(name, applied))
    );

    const outcomes = await runner.execute(targets.get("base"), {
      roleLimit: ["shell", "git"],
      skipRoles: ["git"]
    });

    expect(applied).toEqual(["shell"]);
    expect(outcomes.map((outcome) => outcome.status)).toEqual(["applied", "skipped", "skipped"]);
  });

  it("keeps going after a failing role", async () => {
    const applied: string[] = [];
    const targets = new TargetRegistry();
    targets.target("base").hasRoles("broken", "shell");
    const { runner, failures } = createRunner([
      {
        name: "broken",
        configure: () => {
          throw new Error("boom");
        }
      },
      recordingRole("shell", applied)
    ]);

    const outcomes = await runner.execute(targets.get("base"));

    expect(applied).toEqual(["shell"]);
    expect(failures).toEqual(["apply role broken: boom"]);
    expect(outcomes.map((outcome) => outcome.status)).toEqual(["failed", "applied"]);
  });

  it("records unknown roles as failures", async () => {
    const targets = new TargetRegistry();
    targets.target("base").hasRoles("missing");
    const { runner, failures } = createRunner([]);

    const outcomes = await runner.execute(targets.get("base"));

    expect(failures).toEqual(["apply role missing: Role 'missing' is not defined"]);
    expect(outcomes[0]?.status).toBe("failed");
  });

  it("applies subjects and handlers inside the role", async () => {
    const targets = new TargetRegistry();
    targets.target("base").hasRoles("motd");
    const { runner, vol, output } = createRunner([
      {
        name: "motd",
        configure: async ({ context }) => {
          const restart = context.handler(new File("/home/tester/restarted").isPresent());
          await context.do([new File("/home/tester/motd").hasContent("hello\n").onChange(restart)]);
        }
      }
    ]);

    await runner.execute(targets.get("base"));

    expect(vol.readFileSync("/home/tester/motd", "utf8")).toBe("hello\n");
    expect(vol.existsSync("/home/tester/restarted")).toBe(true);
    expect(output()[0]).toBe("[*]   Role motd");
    expect(output()[1]).toBe("[*]     path /home/tester/motd");
  });
});
