import { Command } from "commander";
import { DEFAULT_FAILURE_STATUS, DEFAULT_HOST, DEFAULT_PORT } from "./config";
import type { ServeOptions } from "./commands/serve";
import { resolveCwd } from "./fs/paths";

export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  debug?: boolean;
  color: boolean;
}

export type ServeAction = (
  options: ServeOptions,
  globals: GlobalOptions,
) => Promise<void>;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(action: ServeAction, cwd: () => string = () => resolveCwd()): Command {
  const program = new Command();

  program
    .name("lazyserve")
    .description(
      "Serve a directory over HTTP, rebuilding the project first whenever its files changed",
    )
    .version("0.1.0")
    .option("-p, --port <port>", `Port to listen on (default: ${DEFAULT_PORT})`)
    .option("--host <host>", `Interface to bind (default: ${DEFAULT_HOST})`)
    .option(
      "-i, --ignore <path>",
      "Path excluded from change detection (repeatable)",
      collect,
      [],
    )
    .option("-s, --serve <dir>", "Directory to serve (default: current directory)")
    .option("-w, --watch <dir>", "Tree scanned for changes (default: current directory)")
    .option(
      "--failure-status <code>",
      `HTTP status for the build failure page (default: ${DEFAULT_FAILURE_STATUS})`,
    )
    .option("-c, --config <file>", "Config file (default: ./lazyserve.json if present)")
    .option("--verbose", "Enable verbose output")
    .option("--quiet", "Suppress non-essential output")
    .option("--debug", "Output structured JSON logs (ndjson format)")
    .option("--no-color", "Disable colored output")
    .argument("[command...]", "Build command, run through the shell")
    // everything after the first word of the command belongs to the command
    .passThroughOptions()
    .action(async (command: string[], opts: Record<string, unknown>) => {
      const str = (key: string): string | undefined => {
        const v = opts[key];
        return typeof v === "string" ? v : undefined;
      };
      const ignore = opts.ignore;

      await action(
        {
          cwd: cwd(),
          port: str("port"),
          host: str("host"),
          serve: str("serve"),
          watch: str("watch"),
          ignore: Array.isArray(ignore)
            ? ignore.filter((p): p is string => typeof p === "string")
            : [],
          failureStatus: str("failureStatus"),
          config: str("config"),
          command,
        },
        {
          verbose: opts.verbose === true,
          quiet: opts.quiet === true,
          debug: opts.debug === true,
          color: opts.color !== false,
        },
      );
    });

  return program;
}
