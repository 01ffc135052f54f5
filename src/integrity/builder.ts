import { spawn, type ChildProcess } from "node:child_process";
import type { Logger } from "../logging";
import type { BuildCommandInput } from "../schemas";

export interface BuildOptions {
  /** Working directory for the build. Defaults to the server's. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Aborting kills the build and its children. */
  signal?: AbortSignal;
}

export interface BuildResult {
  /** stdout and stderr interleaved in the order the chunks arrived */
  output: Buffer;
  succeeded: boolean;
  /** null when the process was killed by a signal or never started */
  exitStatus: number | null;
  signal: NodeJS.Signals | null;
  durationMs: number;
}

export type BuildRunner = (
  command: BuildCommandInput,
  options?: BuildOptions,
) => Promise<BuildResult>;

/**
 * Flatten an argv vector into the single string handed to the shell.
 */
export function toShellCommand(command: BuildCommandInput): string {
  return typeof command === "string" ? command : command.join(" ");
}

const isWindows = process.platform === "win32";

// The shell may fork the real build, so signal the whole process group.
function killBuild(child: ChildProcess): void {
  if (!isWindows && child.pid !== undefined) {
    try {
      process.kill(-child.pid, "SIGTERM");
      return;
    } catch {
      // group already gone; fall back to the shell itself
    }
  }
  child.kill("SIGTERM");
}

/**
 * Run `command` through the shell and capture its merged output.
 *
 * Never rejects: a non-zero exit, a signal or a failure to launch all come
 * back as `succeeded: false`. There is no timeout; `options.signal` is the only
 * way to stop a build early.
 */
export async function runBuild(
  command: BuildCommandInput,
  options: BuildOptions = {},
): Promise<BuildResult> {
  const log = options.logger;
  const startTime = Date.now();
  const shellCommand = toShellCommand(command).trim();

  if (shellCommand.length === 0) {
    log?.debug("No build command configured, skipping build");
    return {
      output: Buffer.alloc(0),
      succeeded: true,
      exitStatus: 0,
      signal: null,
      durationMs: 0,
    };
  }

  if (options.signal?.aborted) {
    log?.debug("Build aborted before it started");
    return {
      output: Buffer.from("Build aborted\n"),
      succeeded: false,
      exitStatus: null,
      signal: null,
      durationMs: 0,
    };
  }

  log?.info(`Building: ${shellCommand}`);

  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let settled = false;

    const finish = (result: Omit<BuildResult, "output" | "durationMs">) => {
      if (settled) return;
      settled = true;
      options.signal?.removeEventListener("abort", onAbort);
      const durationMs = Date.now() - startTime;
      if (result.succeeded) {
        log?.info(`Build completed successfully in ${durationMs}ms`);
      } else {
        log?.warn(
          `Build failed in ${durationMs}ms (${result.signal ? `signal ${result.signal}` : `exit status ${result.exitStatus}`})`,
        );
      }
      resolve({ ...result, output: Buffer.concat(chunks), durationMs });
    };

    const child = spawn(shellCommand, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      shell: true,
      stdio: ["ignore", "pipe", "pipe"],
      detached: !isWindows,
    });

    const onAbort = () => killBuild(child);
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const collect = (data: Buffer) => {
      chunks.push(data);
      log?.debug(data.toString().trimEnd());
    };
    child.stdout?.on("data", collect);
    child.stderr?.on("data", collect);

    child.on("error", (err) => {
      chunks.push(Buffer.from(`Failed to start build: ${err.message}\n`));
      finish({ succeeded: false, exitStatus: null, signal: null });
    });

    // "close" fires after both pipes drained, so no output is lost
    child.on("close", (code, signal) => {
      finish({ succeeded: code === 0, exitStatus: code, signal });
    });
  });
}
