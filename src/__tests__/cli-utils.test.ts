import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createShutdownHandler, executeCommand, handleError } from "../cli-utils";
import { ConfigError, InterruptedError } from "../errors";
import type { Logger } from "../logging";
import { createMockLogger } from "./helpers";

describe("handleError", () => {
  let mockLogger: Logger;

  beforeEach(() => {
    mockLogger = createMockLogger();
  });

  it("formats LazyServeError with code", () => {
    handleError(new ConfigError("bad config"), mockLogger, {});

    expect(mockLogger.error).toHaveBeenCalledWith("[CONFIG_ERROR] bad config");
  });

  it("formats regular Error message", () => {
    handleError(new Error("something failed"), mockLogger, {});

    expect(mockLogger.error).toHaveBeenCalledWith("something failed");
  });

  it("shows stack in verbose mode for regular Error", () => {
    const error = new Error("something failed");
    error.stack = "Error: something failed\n    at test.ts:1:1";
    handleError(error, mockLogger, { verbose: true });

    expect(mockLogger.debug).toHaveBeenCalledWith(
      "Error: something failed\n    at test.ts:1:1",
    );
  });

  it("does not show stack when not verbose", () => {
    handleError(new Error("something failed"), mockLogger, { verbose: false });

    expect(mockLogger.debug).not.toHaveBeenCalled();
  });

  it("handles non-Error types", () => {
    handleError("string error", mockLogger, {});
    expect(mockLogger.error).toHaveBeenCalledWith("string error");
  });
});

describe("executeCommand", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("does not exit when the command succeeds", async () => {
    const exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
    const fn = vi.fn(async () => {});

    await executeCommand(fn, createMockLogger(), {});

    expect(fn).toHaveBeenCalledTimes(1);
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it("logs and exits 1 on failure", async () => {
    const exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
    const logger = createMockLogger();

    await executeCommand(async () => {
      throw new ConfigError("bad port");
    }, logger, {});

    expect(logger.error).toHaveBeenCalledWith("[CONFIG_ERROR] bad port");
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("exits 130 when interrupted", async () => {
    const exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);

    await executeCommand(async () => {
      throw new InterruptedError();
    }, createMockLogger(), {});

    expect(exitSpy).toHaveBeenCalledWith(130);
  });
});

describe("createShutdownHandler", () => {
  it("runs cleanup and exits 0", async () => {
    const cleanupFn = vi.fn(async () => {});
    const exit = vi.fn();
    const logger = createMockLogger();
    const shutdown = createShutdownHandler(logger, { cleanup: cleanupFn }, exit);

    await shutdown("SIGINT");

    expect(logger.info).toHaveBeenCalledWith("Received SIGINT, shutting down...");
    expect(cleanupFn).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("exits 0 without a cleanup handler", async () => {
    const exit = vi.fn();
    await createShutdownHandler(createMockLogger(), undefined, exit)("SIGTERM");

    expect(exit).toHaveBeenCalledWith(0);
  });

  it("exits 1 when cleanup fails", async () => {
    const exit = vi.fn();
    const logger = createMockLogger();
    const shutdown = createShutdownHandler(
      logger,
      {
        cleanup: async () => {
          throw new Error("close failed");
        },
      },
      exit,
    );

    await shutdown("SIGTERM");

    expect(logger.error).toHaveBeenCalledWith("Cleanup failed: close failed");
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("gives up on cleanup after the timeout", async () => {
    const exit = vi.fn();
    const logger = createMockLogger();
    const shutdown = createShutdownHandler(
      logger,
      { cleanup: () => new Promise<void>(() => {}), timeout: 20 },
      exit,
    );

    await shutdown("SIGINT");

    expect(logger.error).toHaveBeenCalledWith("Cleanup failed: Cleanup timeout");
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("exits 130 on a second signal during cleanup", async () => {
    const exit = vi.fn();
    const shutdown = createShutdownHandler(
      createMockLogger(),
      { cleanup: () => new Promise<void>(() => {}), timeout: 20 },
      exit,
    );

    const first = shutdown("SIGINT");
    await shutdown("SIGINT");

    expect(exit).toHaveBeenCalledWith(130);
    await first;
    expect(exit).toHaveBeenLastCalledWith(1);
  });
});
