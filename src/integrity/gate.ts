import type { Logger } from "../logging";
import type { BuildCommandInput } from "../schemas";
import { Mutex } from "../fs/lock";
import { canonicalIgnoreSet } from "../fs/paths";
import { runBuild, type BuildResult, type BuildRunner } from "./builder";
import { computeFingerprint, type Fingerprint } from "./fingerprint";

export const FAILURE_PREFIX = "Failed to build! Command output:\n\n";

export type GateState = "unbuilt" | "fresh" | "failing";

export type FreshnessResult =
  | { status: "ok"; rebuilt: boolean }
  | { status: "failed"; message: string; result: BuildResult };

export type FingerprintFn = (
  root: string,
  ignored: ReadonlySet<string>,
  options?: { logger?: Logger },
) => Promise<Fingerprint>;

export interface RebuildGateOptions {
  /** Tree scanned for changes. */
  root: string;
  command: BuildCommandInput;
  /** Absolute paths excluded from the scan. Relative ones resolve against `cwd`. */
  ignore?: readonly string[];
  /** Working directory for the build command. */
  cwd?: string;
  logger?: Logger;
  runner?: BuildRunner;
  fingerprint?: FingerprintFn;
}

/**
 * Decides whether the project must be rebuilt before a file is served.
 *
 * The stored fingerprint only moves forward after a successful build, so a
 * failing build is retried on every call until it passes or the tree changes.
 * The check and the build run under one lock: concurrent callers queue, and
 * each re-checks once it gets the lock.
 */
export class RebuildGate {
  private lastKnownFingerprint: Fingerprint | undefined;
  private lastFailed = false;
  private readonly lock = new Mutex();
  private readonly shutdown = new AbortController();
  private readonly ignored: ReadonlySet<string>;
  private readonly runner: BuildRunner;
  private readonly fingerprint: FingerprintFn;

  constructor(private readonly options: RebuildGateOptions) {
    this.ignored = canonicalIgnoreSet(options.ignore ?? [], options.cwd);
    this.runner = options.runner ?? runBuild;
    this.fingerprint = options.fingerprint ?? computeFingerprint;
  }

  get state(): GateState {
    if (this.lastFailed) return "failing";
    return this.lastKnownFingerprint === undefined ? "unbuilt" : "fresh";
  }

  /** Fingerprint recorded at the last successful build. */
  get storedFingerprint(): Fingerprint | undefined {
    return this.lastKnownFingerprint;
  }

  get ignoredPaths(): ReadonlySet<string> {
    return this.ignored;
  }

  /** Kill the running build, if any. Later builds fail immediately. */
  abort(): void {
    this.shutdown.abort();
  }

  async ensureFresh(): Promise<FreshnessResult> {
    return this.lock.runExclusive(() => this.checkAndBuild());
  }

  private async checkAndBuild(): Promise<FreshnessResult> {
    const log = this.options.logger;
    const current = await this.fingerprint(this.options.root, this.ignored, {
      logger: log,
    });

    if (current === this.lastKnownFingerprint) {
      return { status: "ok", rebuilt: false };
    }

    log?.debug(
      this.lastKnownFingerprint === undefined
        ? "No successful build yet"
        : `Tree changed (${this.lastKnownFingerprint} -> ${current})`,
    );

    const result = await this.runner(this.options.command, {
      cwd: this.options.cwd,
      logger: log,
      signal: this.shutdown.signal,
    });

    if (!result.succeeded) {
      this.lastFailed = true;
      return {
        status: "failed",
        message: FAILURE_PREFIX + result.output.toString("utf-8"),
        result,
      };
    }

    this.lastFailed = false;
    this.lastKnownFingerprint = current;
    return { status: "ok", rebuilt: true };
  }
}
