import { describe, it, expect } from "vitest";
import { HasOwner, RoleContext } from "@hostform/convergence";
import { createTestRuntime } from "@hostform/convergence/testing";
import { TargetNotSupportedError, TargetRegistry, UnknownTargetError } from "@hostform/targets";
import type { VariableTree } from "@hostform/variables";
import { RoleScope } from "./role-scope.js";
import type { RunContext } from "./run-context.js";

interface ScopeOptions {
  files?: Record<string, string>;
  platform?: "linux" | "darwin";
  env?: Record<string, string>;
  vars?: VariableTree;
}

function createScope(options: ScopeOptions = {}) {
  const testRuntime = createTestRuntime({ files: options.files });
  const targets = new TargetRegistry();
  targets.target("laptop").dependsOn("base");
  targets.target("base");
  targets.target("server").dependsOn("base");

  const run: RunContext = {
    root: "/p",
    target: "laptop",
    elevation: "just-in-time",
    host: {
      os: "Linux",
      platform: options.platform ?? "linux",
      user: { username: "tester", groupname: "tester", homeDir: "/home/tester" }
    },
    env: options.env ?? {},
    vars: options.vars ?? {}
  };
  const scope = new RoleScope({
    role: "shell",
    context: new RoleContext(testRuntime.runtime),
    run,
    targets
  });
  return { scope, ...testRuntime };
}

describe("RoleScope", () => {
  it("owns files by the invoking user on linux", () => {
    const { scope } = createScope();

    expect(scope.file("/home/tester/a").isPresent().getAssertion(HasOwner)?.name).toBe(
      "has owner: user=tester group=tester"
    );
  });

  it("leaves ownership alone elsewhere", () => {
    const { scope } = createScope({ platform: "darwin" });

    expect(scope.file("/home/tester/a").isPresent().hasAssertion(HasOwner)).toBe(false);
  });

  it("resolves home and XDG paths", () => {
    const { scope } = createScope();

    expect(scope.home()).toBe("/home/tester");
    expect(scope.home(".bashrc")).toBe("/home/tester/.bashrc");
    expect(scope.xdgConfigHome("git", "config")).toBe("/home/tester/.config/git/config");
    expect(scope.xdgDataHome()).toBe("/home/tester/.local/share");
  });

  it("prefers XDG variables from the environment", () => {
    const { scope } = createScope({ env: { XDG_CONFIG_HOME: "/cfg", XDG_DATA_HOME: "/data" } });

    expect(scope.xdgConfigHome("git")).toBe("/cfg/git");
    expect(scope.xdgDataHome("fonts")).toBe("/data/fonts");
  });

  it("answers which targets are applied", () => {
    const { scope } = createScope();

    expect(scope.isTargeted("laptop")).toBe(true);
    expect(scope.isTargeted("base")).toBe(true);
    expect(scope.isTargeted("server")).toBe(false);
    expect(() => scope.isTargeted("missing")).toThrow(UnknownTargetError);
  });

  it("fails roles that do not support the target", () => {
    const { scope } = createScope();

    expect(() => scope.notSupported()).toThrow(TargetNotSupportedError);
    expect(() => scope.notSupported()).toThrow(
      "The role 'shell' does not support the target 'laptop'"
    );
  });

  it("renders role templates with vars and targets", async () => {
    const { scope } = createScope({
      files: {
        "/p/roles/shell/gitconfig.mustache":
          "[user]\n  name = {{vars.git.name}}\n{{#targeted.laptop}}\n  laptop = true\n{{/targeted.laptop}}\n{{#targeted.server}}\n  server = true\n{{/targeted.server}}\n"
      },
      vars: { git: { name: "Tester" } }
    });

    expect(await scope.template("gitconfig.mustache")).toBe(
      "[user]\n  name = Tester\n  laptop = true\n"
    );
  });

  it("reads role sources", async () => {
    const { scope } = createScope({ files: { "/p/roles/shell/aliases": "alias ll='ls -l'\n" } });

    expect(scope.source("aliases")).toBe("/p/roles/shell/aliases");
    expect(await scope.readSource("aliases")).toBe("alias ll='ls -l'\n");
  });

  it("replicates file trees with rendered templates", async () => {
    const { scope, vol } = createScope({
      platform: "darwin",
      files: {
        "/p/roles/shell/dotfiles/.bashrc.mustache": "export EDITOR={{vars.editor}}\n",
        "/p/roles/shell/dotfiles/.inputrc": "set bell-style none\n"
      },
      vars: { editor: "vi" }
    });

    await scope.do(scope.fileTree("dotfiles").replicatesChildrenTo("/home/tester"));

    expect(vol.readFileSync("/home/tester/.bashrc", "utf8")).toBe("export EDITOR=vi\n");
    expect(vol.readFileSync("/home/tester/.inputrc", "utf8")).toBe("set bell-style none\n");
  });

  it("applies subjects through the role context", async () => {
    const { scope, vol } = createScope({ platform: "darwin" });

    await scope.do(scope.directory("/home/tester/.config/app").isPresent());
    await scope.ensure(scope.directory("/home/tester/.config/app").isPresent());

    expect(vol.existsSync("/home/tester/.config/app")).toBe(true);
  });
});
