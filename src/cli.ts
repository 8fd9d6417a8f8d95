import { Command } from "commander";
import { VERSION, loadConfig } from "./config.js";
import { ENV } from "./env.js";
import { describeFailure, errorMessage } from "./errors.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { handleConnection } from "./pipeline.js";
import { resolveTarget } from "./resolver.js";

interface ConfigOption {
  readonly config: string;
}

/**
 * Bridge mode: the service manager hands one accepted connection over as stdin/stdout.
 */
export async function bridgeAction(options: ConfigOption): Promise<void> {
  await handleConnection(process.stdin, process.stdout, { configPath: options.config });
}

/**
 * Check mode: load the configuration and print what it defines.
 */
export async function checkAction(options: ConfigOption): Promise<void> {
  const config = await loadConfig(options.config);
  if (!config.ok) {
    logError(describeFailure(config.failure));
    process.exitCode = 1;
    return;
  }
  const { settings, projects } = config.value;
  console.log(`spool: ${settings.spool}`);
  console.log(`notifications: ${settings.notifications}`);
  console.log(`mode: ${settings.mode}`);
  console.log(`mailto: ${settings.mailto || "(none)"}`);
  for (const [path, shape] of settings.routes) {
    console.log(`route: ${path} -> ${shape}`);
  }
  console.table(
    [...projects].flatMap(([project, targets]) =>
      [...targets].map(([target, command]) => ({ project, target, command }))
    )
  );
  info(`Configuration ${options.config} defines ${projects.size} projects.`);
}

/**
 * Resolve mode: show which configured key a request would build.
 */
export async function resolveAction(
  project: string,
  target: string,
  task: string | undefined,
  options: ConfigOption
): Promise<void> {
  const config = await loadConfig(options.config);
  if (!config.ok) {
    logError(describeFailure(config.failure));
    process.exitCode = 1;
    return;
  }
  const resolution = resolveTarget(config.value.projects, project, target, task ?? "");
  if (!resolution.ok) {
    console.log(describeFailure(resolution.failure));
    process.exitCode = 1;
    return;
  }
  console.log(`${resolution.value.matchedTargetKey}: ${resolution.value.buildCommand}`);
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("build-bridge")
    .description("Turn webhook build requests into spool job files")
    .version(VERSION)
    .option("--log-level <level>", "debug, info, warn or error")
    .hook("preAction", command => {
      const level: unknown = command.opts().logLevel;
      if (typeof level === "string") {
        setLogLevel(level);
      }
    });

  program
    .command("bridge")
    .description("Handle one connection on stdin/stdout")
    .option("-c, --config <path>", "configuration file", ENV.CONFIG_PATH)
    .action(async (options: ConfigOption) => bridgeAction(options));
  program
    .command("check")
    .description("Validate the configuration and list projects")
    .option("-c, --config <path>", "configuration file", ENV.CONFIG_PATH)
    .action(async (options: ConfigOption) => checkAction(options));
  program
    .command("resolve <project> <target> [task]")
    .description("Show the configured target and command a request would resolve to")
    .option("-c, --config <path>", "configuration file", ENV.CONFIG_PATH)
    .action(async (project: string, target: string, task: string | undefined, options: ConfigOption) =>
      resolveAction(project, target, task, options)
    );

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str)
      })
      .parseAsync([...argv]);
  } catch (cause) {
    logError(`CLI failed: ${errorMessage(cause)}`);
    process.exitCode = 1;
  }
}
