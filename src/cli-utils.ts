import type { Logger } from "./logging";
import { toExitCode, isLazyServeError, InterruptedError } from "./errors";

export interface CommandOptions {
  verbose?: boolean;
}

export async function executeCommand(
  fn: () => Promise<void>,
  logger: Logger,
  options: CommandOptions,
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    handleError(error, logger, options);
    process.exit(toExitCode(error));
  }
}

export function handleError(
  error: unknown,
  logger: Logger,
  options: CommandOptions,
): void {
  if (isLazyServeError(error)) {
    logger.error(`[${error.code}] ${error.message}`);
  } else if (error instanceof Error) {
    logger.error(error.message);
    if (options.verbose) {
      logger.debug(error.stack || "");
    }
  } else {
    logger.error(String(error));
  }
}

export interface CleanupHandler {
  cleanup: () => Promise<void>;
  timeout?: number; // Default 10 seconds
}

export type ExitFn = (code: number) => void;

/**
 * Build the signal callback used by `setupInterruptHandler`. The first signal
 * runs `cleanup` and exits 0, or 1 if cleanup failed. A second signal while
 * cleanup is pending exits 130.
 */
export function createShutdownHandler(
  logger: Logger,
  cleanup?: CleanupHandler,
  exit: ExitFn = (code) => process.exit(code),
): (signal: NodeJS.Signals) => Promise<void> {
  let interrupted = false;

  return async (signal) => {
    if (interrupted) {
      exit(toExitCode(new InterruptedError()));
      return;
    }
    interrupted = true;
    logger.info(`Received ${signal}, shutting down...`);

    let code = 0;
    if (cleanup) {
      const timeout = cleanup.timeout || 10000;
      let timer: NodeJS.Timeout | undefined;
      try {
        await Promise.race([
          cleanup.cleanup(),
          new Promise<void>((_, reject) => {
            timer = setTimeout(() => reject(new Error("Cleanup timeout")), timeout);
          }),
        ]);
      } catch (err) {
        logger.error(`Cleanup failed: ${err instanceof Error ? err.message : String(err)}`);
        code = 1;
      } finally {
        clearTimeout(timer);
      }
    }

    exit(code);
  };
}

/**
 * Shut down on SIGINT/SIGTERM. Returns a function that removes the handlers.
 */
export function setupInterruptHandler(
  logger: Logger,
  cleanup?: CleanupHandler,
): () => void {
  const shutdown = createShutdownHandler(logger, cleanup);
  const listener = (signal: NodeJS.Signals) => {
    void shutdown(signal);
  };
  process.on("SIGINT", listener);
  process.on("SIGTERM", listener);

  return () => {
    process.off("SIGINT", listener);
    process.off("SIGTERM", listener);
  };
}
