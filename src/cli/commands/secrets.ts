import type { Command } from "commander";
import { SecretDecryptionError, SecretFormatError } from "@hostform/variables";
import type { CliContainer } from "../container.js";
import { CliError } from "../errors.js";
import { createCommandLogger } from "./shared.js";

export interface EncryptCommandOptions {
  file?: string;
  plain?: boolean;
}

export interface DecryptCommandOptions {
  file?: string;
}

export function registerSecretCommands(program: Command, container: CliContainer): void {
  program
    .command("encrypt")
    .description("Encrypt text, a file in place, or standard input.")
    .argument("[text]", "Text to encrypt")
    .option("--file <path>", "Encrypt this file in place")
    .option("--plain", "Write the secret on a single line")
    .action(async (input: string | undefined, options: EncryptCommandOptions) => {
      await executeEncrypt(program, container, input, options);
    });

  program
    .command("decrypt")
    .description("Decrypt text, a file in place, or standard input.")
    .argument("[text]", "Secret to decrypt")
    .option("--file <path>", "Decrypt this file in place")
    .action(async (input: string | undefined, options: DecryptCommandOptions) => {
      await executeDecrypt(program, container, input, options);
    });

  program
    .command("view")
    .description("Print a decrypted file without changing it.")
    .argument("<file>", "Encrypted file")
    .action(async (file: string) => {
      await executeView(container, file);
    });
}

function password(container: CliContainer): Promise<string> {
  const { username } = container.userInfo();
  const elevation = container.env.platform === "win32" ? "none" : "just-in-time";
  return container.password({ elevation, username }).get();
}

async function decrypt(container: CliContainer, secret: string): Promise<Buffer> {
  const key = await password(container);
  try {
    return await container.secrets.decrypt(secret, key);
  } catch (error) {
    if (error instanceof SecretDecryptionError || error instanceof SecretFormatError) {
      throw new CliError(error.message, { isUserError: true, cause: error });
    }
    throw error;
  }
}

async function readInput(
  container: CliContainer,
  program: Command,
  scope: string,
  input: string | undefined
): Promise<string> {
  if (input !== undefined) {
    return input;
  }
  createCommandLogger(container, program, scope).info(
    "Reading from standard input. Ctrl-D to finish writing."
  );
  return container.readStdin();
}

export async function executeEncrypt(
  program: Command,
  container: CliContainer,
  input: string | undefined,
  options: EncryptCommandOptions
): Promise<void> {
  const pretty = !options.plain;
  if (options.file !== undefined) {
    const content = await container.fs.readFile(options.file);
    const secret = await container.secrets.encrypt(content, await password(container), { pretty });
    await container.fs.writeFile(options.file, secret);
    createCommandLogger(container, program, "encrypt").success(`Encrypted ${options.file}.`);
    return;
  }

  const plaintext = await readInput(container, program, "encrypt", input);
  container.stdout(await container.secrets.encrypt(plaintext, await password(container), { pretty }));
}

export async function executeDecrypt(
  program: Command,
  container: CliContainer,
  input: string | undefined,
  options: DecryptCommandOptions
): Promise<void> {
  if (options.file !== undefined) {
    const secret = await container.fs.readFile(options.file, "utf8");
    await container.fs.writeFile(options.file, await decrypt(container, secret));
    createCommandLogger(container, program, "decrypt").success(`Decrypted ${options.file}.`);
    return;
  }

  const secret = await readInput(container, program, "decrypt", input);
  container.stdout((await decrypt(container, secret)).toString("utf8"));
}

export async function executeView(container: CliContainer, file: string): Promise<void> {
  const secret = await container.fs.readFile(file, "utf8");
  container.stdout((await decrypt(container, secret)).toString("utf8"));
}
