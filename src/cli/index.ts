import { supportsColorStderr } from "chalk";
import { Command, CommanderError } from "commander";
import type { EnvInput, EnvUpdates, EvaluateOptions } from "../ast";
import { resolveConfig } from "../config";
import { EnvSyntaxError, formatSyntaxError } from "../errors";
import { EnvLayer, evaluate } from "../expander";
import { readEnvFile } from "../load";
import { logger, setLogLevel } from "../logger";

export type CliIO = {
  env: EnvInput;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  color: boolean;
};

type CliOptions = {
  json?: boolean;
  ignoreCase?: boolean;
  verbose?: boolean;
};

const defaultIO = (): CliIO => ({
  env: process.env,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  color: Boolean(supportsColorStderr),
});

export function createProgram(io: CliIO): Command {
  const config = resolveConfig(io.env);
  const program = new Command();

  program
    .name("env-assign")
    .description("Show the results of processing environment assignments.")
    .version("0.1.0")
    .argument("[strings...]", "assignment text, or @path of a file to read")
    .option("--json", "print every update as one JSON object")
    .option("--ignore-case", "uppercase variable names")
    .option("--no-ignore-case", "keep variable names as written")
    .option("-v, --verbose", "log debug output")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action(async (strings: string[], options: CliOptions) => {
      if (options.verbose) {
        setLogLevel("debug");
      }
      const evaluateOptions: EvaluateOptions = {
        caseInsensitive: options.ignoreCase ?? config.caseInsensitive,
      };

      let env: EnvInput = io.env;
      const all: EnvUpdates = new Map();
      for (const text of strings) {
        const path = text.startsWith("@") ? text.slice(1) : undefined;
        const source = path === undefined ? text : await readEnvFile(path);
        const updates = evaluateSource(source, env, evaluateOptions, path);
        logger.debug("Evaluated assignments", {
          source: path ?? "<string>",
          updates: updates.size,
        });

        const layer = new EnvLayer(env, evaluateOptions);
        for (const [name, value] of updates) {
          layer.set(name, value);
          all.set(name, value);
          if (!options.json) {
            io.stdout(
              value === null
                ? `unset ${name}\n`
                : `${name} = ${JSON.stringify(value)}\n`,
            );
          }
        }
        env = layer.toEnv();
      }

      if (options.json) {
        io.stdout(`${JSON.stringify(Object.fromEntries(all), null, 2)}\n`);
      }
    });

  return program;
}

function evaluateSource(
  source: string,
  env: EnvInput,
  options: EvaluateOptions,
  path: string | undefined,
): EnvUpdates {
  try {
    return evaluate(source, env, options);
  } catch (error) {
    if (error instanceof EnvSyntaxError && path !== undefined) {
      error.source = path;
    }
    throw error;
  }
}

function reportError(error: unknown, io: CliIO): number {
  if (error instanceof EnvSyntaxError) {
    io.stderr(`${formatSyntaxError(error, { color: io.color })}\n`);
    return 1;
  }
  if (error instanceof CommanderError) {
    // commander has already written its message
    return error.exitCode;
  }
  logger.error(error instanceof Error ? error.message : String(error));
  return 1;
}

/** Run the CLI with `args` (without the node and script paths). */
export async function run(
  args: string[],
  io: CliIO = defaultIO(),
): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (error) {
    return reportError(error, io);
  }
}
