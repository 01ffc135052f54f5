import * as http from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "../logging";
import type { BuildCommandInput } from "../schemas";
import { ServerStartError } from "../errors";
import { RebuildGate, type BuildRunner } from "../integrity";
import { RequestHandler } from "./handler";
import { createStaticFileServer, type StaticFileServer } from "./staticFiles";

export interface DevServerOptions {
  port: number;
  host?: string;
  /** Directory served over HTTP. */
  serve: string;
  /** Tree scanned for changes. */
  watch: string;
  ignore?: readonly string[];
  command: BuildCommandInput;
  failureStatus?: number;
  cwd?: string;
  logger?: Logger;
  runner?: BuildRunner;
  files?: StaticFileServer;
}

export interface DevServer {
  readonly gate: RebuildGate;
  readonly server: http.Server;
  listen(): Promise<AddressInfo>;
  close(): Promise<void>;
}

export function createDevServer(options: DevServerOptions): DevServer {
  const log = options.logger;
  const gate = new RebuildGate({
    root: options.watch,
    command: options.command,
    ignore: options.ignore,
    cwd: options.cwd,
    logger: log,
    runner: options.runner,
  });
  const files =
    options.files ?? createStaticFileServer(options.serve, { logger: log });
  const handler = new RequestHandler(gate, files, {
    failureStatus: options.failureStatus,
    logger: log,
  });
  const server = http.createServer(handler.listener);

  return {
    gate,
    server,
    listen() {
      return new Promise((resolve, reject) => {
        const onError = (err: Error) => {
          reject(new ServerStartError(`Cannot listen on ${options.host ?? "*"}:${options.port}: ${err.message}`));
        };
        server.once("error", onError);
        server.listen(options.port, options.host, () => {
          server.off("error", onError);
          // errors after startup (EMFILE, ...) must not take the process down
          server.on("error", (err) => {
            log?.error(`Server error: ${err.message}`);
          });
          const address = server.address();
          if (address === null || typeof address === "string") {
            reject(new ServerStartError(`Unexpected server address: ${String(address)}`));
            return;
          }
          resolve(address);
        });
      });
    },
    close() {
      return new Promise((resolve, reject) => {
        if (!server.listening) {
          resolve();
          return;
        }
        gate.abort();
        server.close((err) => (err ? reject(err) : resolve()));
        // requests waiting on a build would otherwise hold close() open
        server.closeAllConnections();
      });
    },
  };
}
