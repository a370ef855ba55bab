import * as clack from "@clack/prompts";

export { isCancel, cancel, log } from "@clack/prompts";

export type PasswordOptions = Parameters<typeof clack.password>[0];

export async function password(opts: PasswordOptions): Promise<string | symbol> {
  return clack.password(opts);
}
