import * as path from "node:path";
import type { Logger } from "../logging";
import { loadConfig, type ConfigOverrides, type ConfigResolved } from "../config";
import { ConfigError, ServeDirNotFoundError } from "../errors";
import { dirExists } from "../fs/util";
import { toShellCommand } from "../integrity/builder";
import { createDevServer, type DevServer } from "../server/server";

export interface ServeOptions {
  cwd: string;
  port?: string;
  host?: string;
  serve?: string;
  watch?: string;
  ignore?: string[];
  failureStatus?: string;
  config?: string;
  /** Positional words after the options; joined into one shell command. */
  command?: string[];
}

function parseIntOption(value: string, flag: string, min: number, max: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ConfigError(`Invalid value for ${flag}: ${value}`);
  }
  return n;
}

export function toOverrides(options: ServeOptions): ConfigOverrides {
  return {
    port:
      options.port !== undefined
        ? parseIntOption(options.port, "--port", 0, 65535)
        : undefined,
    host: options.host,
    serve: options.serve,
    watch: options.watch,
    ignore: options.ignore,
    command:
      options.command && options.command.length > 0
        ? options.command.join(" ")
        : undefined,
    failureStatus:
      options.failureStatus !== undefined
        ? parseIntOption(options.failureStatus, "--failure-status", 200, 599)
        : undefined,
  };
}

export async function resolveServeConfig(
  options: ServeOptions,
): Promise<ConfigResolved> {
  const config = await loadConfig({
    cwd: options.cwd,
    configPath: options.config,
    overrides: toOverrides(options),
  });

  if (!(await dirExists(config.serve))) {
    throw new ServeDirNotFoundError(config.serve);
  }

  return config;
}

function isWithin(dir: string, root: string): boolean {
  const rel = path.relative(root, dir);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * True when files written to the served directory would change the watched
 * tree's fingerprint.
 */
export function servesIntoWatchedTree(
  serve: string,
  watch: string,
  ignored: Iterable<string>,
): boolean {
  if (!isWithin(serve, watch)) return false;
  for (const entry of ignored) {
    if (isWithin(serve, entry)) return false;
  }
  return true;
}

/**
 * Start the dev server and return it once it is listening.
 * The caller owns shutdown.
 */
export async function serveCommand(
  options: ServeOptions,
  logger: Logger,
): Promise<DevServer> {
  const config = await resolveServeConfig(options);

  const dev = createDevServer({
    port: config.port,
    host: config.host,
    serve: config.serve,
    watch: config.watch,
    ignore: config.ignore,
    command: config.command,
    failureStatus: config.failure_status,
    cwd: options.cwd,
    logger,
  });

  const address = await dev.listen();
  const shownHost = address.family === "IPv6" ? `[${address.address}]` : address.address;

  logger.info(`Serving ${config.serve} at http://${shownHost}:${address.port}/`);
  logger.debug(`Watching ${config.watch}`);
  for (const ignored of dev.gate.ignoredPaths) {
    logger.debug(`Ignoring ${ignored}`);
  }
  const command = toShellCommand(config.command);
  if (command.length === 0) {
    logger.warn("No build command given; files are served without building");
  } else {
    logger.info(`Build command: ${command}`);
    if (servesIntoWatchedTree(config.serve, config.watch, dev.gate.ignoredPaths)) {
      logger.warn(
        `${config.serve} is inside the watched tree and not ignored. If the build writes there, every request rebuilds (pass --ignore ${config.serve})`,
      );
    }
  }

  return dev;
}
