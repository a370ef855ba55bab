import { cancel, isCancel, password } from "@hostform/design-system";
import { OperationCancelledError } from "./errors.js";

export interface PromptAdapter {
  password: typeof password;
  isCancel: typeof isCancel;
  cancel: typeof cancel;
}

export interface PromptRunner {
  password(message: string): Promise<string>;
}

export function createPromptRunner(
  adapter: PromptAdapter = { password, isCancel, cancel }
): PromptRunner {
  return {
    async password(message) {
      const result = await adapter.password({ message });
      if (adapter.isCancel(result)) {
        adapter.cancel("Operation cancelled.");
        throw new OperationCancelledError();
      }
      return result;
    }
  };
}
