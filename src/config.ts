import * as path from "node:path";
import { ConfigSchema, type Config, type BuildCommandInput } from "./schemas";
import { getConfigPath } from "./fs/paths";
import { tryReadFile } from "./fs/util";
import { ConfigError, InvalidJsonError, SchemaValidationError } from "./errors";

export interface ConfigResolved {
  port: number;
  host: string;
  /** Directory files are served from. Absolute. */
  serve: string;
  /** Root of the tree scanned for changes. Absolute. */
  watch: string;
  /** Absolute paths pruned from the scan. */
  ignore: string[];
  command: BuildCommandInput;
  failure_status: number;
}

export interface ConfigOverrides {
  port?: number;
  host?: string;
  serve?: string;
  watch?: string;
  ignore?: string[];
  command?: BuildCommandInput;
  failureStatus?: number;
}

export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = "localhost";
export const DEFAULT_FAILURE_STATUS = 200;

export function defaultConfig(cwd: string): ConfigResolved {
  return {
    port: DEFAULT_PORT,
    host: DEFAULT_HOST,
    serve: cwd,
    watch: cwd,
    ignore: [],
    command: "",
    failure_status: DEFAULT_FAILURE_STATUS,
  };
}

/**
 * Relative paths in a config file are taken relative to the file's directory,
 * the way other tools treat paths in their rc files.
 */
export function mergeWithDefaults(
  partial: Config,
  cwd: string,
  baseDir: string = cwd,
): ConfigResolved {
  const defaults = defaultConfig(cwd);
  return {
    port: partial.port ?? defaults.port,
    host: partial.host ?? defaults.host,
    serve: partial.serve ? path.resolve(baseDir, partial.serve) : defaults.serve,
    watch: partial.watch ? path.resolve(baseDir, partial.watch) : defaults.watch,
    ignore: (partial.ignore ?? []).map((p) => path.resolve(baseDir, p)),
    command: partial.command ?? defaults.command,
    failure_status: partial.failure_status ?? defaults.failure_status,
  };
}

export function applyOverrides(
  config: ConfigResolved,
  overrides: ConfigOverrides,
  cwd: string,
): ConfigResolved {
  // an empty positional means "not given", not "build nothing"
  const command =
    overrides.command !== undefined && overrides.command.length > 0
      ? overrides.command
      : config.command;

  return {
    port: overrides.port ?? config.port,
    host: overrides.host ?? config.host,
    serve: overrides.serve ? path.resolve(cwd, overrides.serve) : config.serve,
    watch: overrides.watch ? path.resolve(cwd, overrides.watch) : config.watch,
    // CLI ignores add to the config file's list
    ignore: [
      ...config.ignore,
      ...(overrides.ignore ?? []).map((p) => path.resolve(cwd, p)),
    ],
    command,
    failure_status: overrides.failureStatus ?? config.failure_status,
  };
}

export interface LoadConfigOptions {
  cwd: string;
  /** Explicit config file; unlike the default file it must exist. */
  configPath?: string;
  overrides?: ConfigOverrides;
}

export async function loadConfig(
  options: LoadConfigOptions,
): Promise<ConfigResolved> {
  const { cwd, overrides } = options;
  const configPath = getConfigPath(cwd, options.configPath);
  let partial: Config = {};

  const read = await tryReadFile(configPath);
  if (read.status === "error") {
    throw read.error;
  }
  if (read.status === "not_found") {
    if (options.configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  } else {
    let data: unknown;
    try {
      data = JSON.parse(read.content);
    } catch {
      throw new InvalidJsonError(`Invalid JSON in file: ${configPath}`);
    }

    const result = ConfigSchema.safeParse(data);
    if (!result.success) {
      throw new SchemaValidationError(
        `Schema validation failed for ${configPath}: ${result.error.message}`,
      );
    }
    partial = result.data;
  }

  const resolved = mergeWithDefaults(partial, cwd, path.dirname(configPath));

  if (overrides) {
    return applyOverrides(resolved, overrides, cwd);
  }

  return resolved;
}
