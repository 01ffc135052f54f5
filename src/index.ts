#!/usr/bin/env node

import { createLogger } from "./logging";
import { executeCommand, setupInterruptHandler } from "./cli-utils";
import { serveCommand } from "./commands/serve";
import { createProgram } from "./program";

const program = createProgram(async (options, globals) => {
  const logger = createLogger({
    verbose: globals.verbose,
    quiet: globals.quiet,
    debug: globals.debug,
    noColor: !globals.color,
  });

  await executeCommand(
    async () => {
      const dev = await serveCommand(options, logger);
      setupInterruptHandler(logger, {
        cleanup: () => dev.close(),
        timeout: 5000,
      });
    },
    logger,
    { verbose: globals.verbose },
  );
});

await program.parseAsync(process.argv);
