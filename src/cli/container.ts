import os from "node:os";
import {
  createAccountDatabase,
  runCommand,
  runInteractive,
  type AccountDatabase,
  type CommandRunner,
  type ElevationType,
  type FileSystem,
  type InteractiveRunner
} from "@hostform/convergence";
import { stderrLines, type LineEmitter } from "@hostform/design-system";
import {
  SecretCodec,
  VariableLoader,
  commandPasswordLoader,
  createPasswordProvider,
  type PasswordLoader,
  type PasswordProvider,
  type ScryptParams
} from "@hostform/variables";
import type { Project } from "../project/define-project.js";
import {
  createCliEnvironment,
  type CliEnvironment,
  type CliEnvironmentInit
} from "./environment.js";
import { createLoggerFactory, type LoggerFactory } from "./logger.js";
import { createPromptRunner, type PromptRunner } from "./prompt-runner.js";

export interface HostUserInfo {
  username: string;
  uid: number;
  gid: number;
  homedir: string;
}

export interface CliDependencies {
  project: Project;
  fs: FileSystem;
  env: CliEnvironmentInit;
  prompts?: PromptRunner;
  commandRunner?: CommandRunner;
  interactiveRunner?: InteractiveRunner;
  /** CLI messages; clack output when unset. */
  logger?: LineEmitter;
  /** The apply tree; stderr when unset. */
  applyLog?: LineEmitter;
  /** Command results meant for pipes (decrypted text, target lists). */
  stdout?: (text: string) => void;
  readStdin?: () => Promise<string>;
  scryptParams?: ScryptParams;
  userInfo?: () => HostUserInfo;
  osType?: string;
  /** The command line, for re-running under sudo. */
  argv?: string[];
  execPath?: string;
  exitOverride?: boolean;
  suppressCommanderOutput?: boolean;
}

export interface PasswordScope {
  elevation: ElevationType;
  username: string;
}

export interface CliContainer {
  env: CliEnvironment;
  fs: FileSystem;
  project: Project;
  /** Directory holding `vars/`, `roles/` and `.target`. */
  root: string;
  loggerFactory: LoggerFactory;
  prompts: PromptRunner;
  commandRunner: CommandRunner;
  interactiveRunner: InteractiveRunner;
  applyLog: LineEmitter;
  stdout: (text: string) => void;
  readStdin: () => Promise<string>;
  accounts: AccountDatabase;
  secrets: SecretCodec;
  userInfo: () => HostUserInfo;
  osType: string;
  argv: string[];
  execPath: string;
  /** One password per container, loaded on first use. */
  password(scope: PasswordScope): PasswordProvider;
  variableLoader(password: PasswordProvider): VariableLoader;
  dependencies: CliDependencies;
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

export function createCliContainer(dependencies: CliDependencies): CliContainer {
  const env = createCliEnvironment(dependencies.env);
  const { fs, project } = dependencies;
  const prompts = dependencies.prompts ?? createPromptRunner();
  const commandRunner = dependencies.commandRunner ?? runCommand;
  const secrets = new SecretCodec(dependencies.scryptParams);

  let passwordProvider: PasswordProvider | undefined;
  const password = (scope: PasswordScope): PasswordProvider => {
    if (!passwordProvider) {
      passwordProvider = createPasswordProvider(
        passwordLoader(project, { prompts, commandRunner, env, scope })
      );
    }
    return passwordProvider;
  };

  return {
    env,
    fs,
    project,
    root: project.root ?? env.cwd,
    loggerFactory: createLoggerFactory(dependencies.logger),
    prompts,
    commandRunner,
    interactiveRunner: dependencies.interactiveRunner ?? runInteractive,
    applyLog: dependencies.applyLog ?? stderrLines,
    stdout:
      dependencies.stdout ??
      ((text) => {
        process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
      }),
    readStdin: dependencies.readStdin ?? readProcessStdin,
    accounts: createAccountDatabase(fs),
    secrets,
    userInfo:
      dependencies.userInfo ??
      (() => {
        const info = os.userInfo();
        return { username: info.username, uid: info.uid, gid: info.gid, homedir: info.homedir };
      }),
    osType: dependencies.osType ?? os.type(),
    argv: dependencies.argv ?? process.argv,
    execPath: dependencies.execPath ?? process.execPath,
    password,
    variableLoader: (provider) => new VariableLoader({ fs, secrets, password: provider }),
    dependencies
  };
}

function passwordLoader(
  project: Project,
  options: {
    prompts: PromptRunner;
    commandRunner: CommandRunner;
    env: CliEnvironment;
    scope: PasswordScope;
  }
): PasswordLoader {
  const configured = project.settings.password;
  if (typeof configured === "function") {
    return configured;
  }
  if (configured !== undefined) {
    return commandPasswordLoader(configured, {
      commands: options.commandRunner,
      elevation: options.scope.elevation,
      username: options.scope.username,
      env: options.env.variables
    });
  }
  return () => options.prompts.password("Secrets password:");
}
