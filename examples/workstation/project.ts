import { fileURLToPath } from "node:url";
import { defineProject, defineRole } from "../../src/index.js";

const git = defineRole("git", async (role) => {
  await role.do(
    role
      .file(role.xdgConfigHome("git", "config"))
      .hasContent(await role.template("gitconfig.mustache"), { createParents: true })
  );
});

const shell = defineRole("shell", async (role) => {
  await role.do(
    role.fileTree("files").replicatesChildrenTo(role.home()),
    role.file(role.home(".bashrc")).hasLines([
      "# Managed by hostform",
      "for f in ~/bashrc.d/*.sh; do . \"$f\"; done"
    ])
  );
});

const docker = defineRole("docker", async (role) => {
  if (role.host.platform !== "linux") {
    role.notSupported();
  }
  await role.do(role.group("docker").isPresent());
  await role.do(role.systemdService("docker").isEnabled().isStarted());
});

export const project = defineProject({
  root: fileURLToPath(new URL(".", import.meta.url)),
  targets: {
    base: { roles: ["shell", "git"] },
    laptop: { requires: ["base"] },
    server: { requires: ["base"], roles: ["docker"] }
  },
  roles: [git, shell, docker],
  settings: {
    templateGlobals: { managedBy: "hostform" }
  }
});
