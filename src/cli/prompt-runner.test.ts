import { describe, it, expect, vi } from "vitest";
import { OperationCancelledError } from "./errors.js";
import { createPromptRunner } from "./prompt-runner.js";

const cancelled = Symbol("cancelled");

describe("createPromptRunner", () => {
  it("asks for a password", async () => {
    const adapter = {
      password: vi.fn(async () => "test-secret"),
      isCancel: (value: unknown): value is symbol => value === cancelled,
      cancel: vi.fn()
    };
    const runner = createPromptRunner(adapter);

    expect(await runner.password("Secrets password:")).toBe("test-secret");
    expect(adapter.password).toHaveBeenCalledWith({ message: "Secrets password:" });
  });

  it("throws when the prompt is cancelled", async () => {
    const adapter = {
      password: vi.fn(async (): Promise<string | symbol> => cancelled),
      isCancel: (value: unknown): value is symbol => value === cancelled,
      cancel: vi.fn()
    };
    const runner = createPromptRunner(adapter);

    await expect(runner.password("Secrets password:")).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(adapter.cancel).toHaveBeenCalledWith("Operation cancelled.");
  });
});
