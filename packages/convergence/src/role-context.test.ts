import { describe, it, expect, vi } from "vitest";
import { createTestRuntime } from "./testing/index.js";
import { EnsureFailedError } from "./errors.js";
import { File } from "./filesystem/entry.js";
import { Handler } from "./handler.js";
import { RoleContext } from "./role-context.js";

describe("RoleContext", () => {
  it("applies subjects in order", async () => {
    const { runtime, vol } = createTestRuntime();
    const context = new RoleContext(runtime);

    await context.do([
      new File("/home/tester/a").hasContent("a"),
      new File("/home/tester/b").hasContent("b")
    ]);

    expect(vol.readFileSync("/home/tester/a", "utf8")).toBe("a");
    expect(vol.readFileSync("/home/tester/b", "utf8")).toBe("b");
  });

  describe("handlers", () => {
    it("fire once when a listened subject changed", async () => {
      const { runtime, vol } = createTestRuntime();
      const context = new RoleContext(runtime);
      const handler = context.handler(new File("/home/tester/reloaded").isPresent());
      const config = new File("/home/tester/app.conf").hasContent("port=1\n").onChange(handler);

      await context.do([config]);
      await context.runHandlers();

      expect(handler.state).toBe("fired");
      expect(vol.existsSync("/home/tester/reloaded")).toBe(true);

      vol.unlinkSync("/home/tester/reloaded");
      await context.runHandlers();
      expect(vol.existsSync("/home/tester/reloaded")).toBe(false);
    });

    it("fire once for several changed subjects", async () => {
      const { runtime, output } = createTestRuntime();
      const context = new RoleContext(runtime);
      const reload = new File("/home/tester/reloaded").isPresent();
      const apply = vi.spyOn(reload, "apply");
      const handler = context.handler(reload);
      const first = new File("/home/tester/a.conf").hasContent("a\n").onChange(handler);
      const second = new File("/home/tester/b.conf").hasContent("b\n").onChange(handler);

      await context.do([first, second]);
      const before = output().length;
      await context.runHandlers();
      await context.runHandlers();

      expect(handler.state).toBe("fired");
      expect(apply).toHaveBeenCalledTimes(1);
      const logged = output().slice(before);
      expect(logged.slice(0, 3)).toEqual([
        "[≈] executing handler for:",
        "[≈]   path /home/tester/a.conf",
        "[≈]   path /home/tester/b.conf"
      ]);
      expect(logged.filter((line) => line.includes("executing handler"))).toHaveLength(1);
    });

    it("report a skip when nothing changed", async () => {
      const { runtime, output } = createTestRuntime({
        files: { "/home/tester/app.conf": "port=1\n" }
      });
      const context = new RoleContext(runtime);
      const handler = context.handler(new File("/home/tester/reloaded").isPresent());
      const config = new File("/home/tester/app.conf").hasContent("port=1\n").onChange(handler);

      await context.do([config]);
      const before = output().length;
      await context.runHandlers();

      expect(handler.state).toBe("skipped");
      expect(output().slice(before)).toEqual([
        "[*] skipped handler for:",
        "[*]   path /home/tester/app.conf"
      ]);
    });

    it("skip silently when generated", async () => {
      const { runtime, output } = createTestRuntime({
        files: { "/home/tester/app.conf": "port=1\n" }
      });
      const context = new RoleContext(runtime);
      const handler = new Handler([new File("/home/tester/reloaded").isPresent()], {
        registry: context,
        generated: true
      });
      context.addHandler(handler);
      const config = new File("/home/tester/app.conf").hasContent("port=1\n").onChange(handler);

      await context.do([config]);
      const before = output().length;
      await context.runHandlers();

      expect(handler.state).toBe("skipped");
      expect(output()).toHaveLength(before);
    });

    it("can be removed from their registry", () => {
      const { runtime } = createTestRuntime();
      const context = new RoleContext(runtime);
      const first = context.handler();
      const second = context.handler();

      first.remove();

      expect(context.registeredHandlers()).toEqual([second]);
    });
  });

  describe("ensure", () => {
    it("throws without modifying when a subject drifts", async () => {
      const { runtime, vol, output } = createTestRuntime();
      const context = new RoleContext(runtime);

      await expect(
        context.ensure([new File("/home/tester/required").isPresent()])
      ).rejects.toBeInstanceOf(EnsureFailedError);

      expect(vol.existsSync("/home/tester/required")).toBe(false);
      expect(output()).toEqual([
        "[*]   assert that",
        "[*]     path /home/tester/required",
        "        × is file"
      ]);
    });

    it("passes when every assertion holds", async () => {
      const { runtime } = createTestRuntime({ files: { "/home/tester/required": "" } });
      const context = new RoleContext(runtime);

      await expect(
        context.ensure([new File("/home/tester/required").isPresent()])
      ).resolves.toBeUndefined();
    });
  });
});
