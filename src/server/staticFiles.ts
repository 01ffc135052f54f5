import type { IncomingMessage, ServerResponse } from "node:http";
import finalhandler from "finalhandler";
import serveStatic from "serve-static";
import type { Logger } from "../logging";

export interface StaticFileServer {
  readonly root: string;
  /** Resolves once the response has been handed off or finished with an error status. */
  serve(req: IncomingMessage, res: ServerResponse): Promise<void>;
}

export interface StaticFileServerOptions {
  logger?: Logger;
}

/**
 * Map request paths onto files under `root`. Missing files get 404, paths
 * escaping the root get 403, and directories serve their index.html.
 */
export function createStaticFileServer(
  root: string,
  options: StaticFileServerOptions = {},
): StaticFileServer {
  const serveFiles = serveStatic(root, {
    index: ["index.html", "index.htm"],
    dotfiles: "allow",
    fallthrough: true,
    redirect: true,
  });

  return {
    root,
    serve(req, res) {
      return new Promise((resolve) => {
        const done = finalhandler(req, res, {
          onerror: (err: unknown) => {
            options.logger?.debug(
              `Static file error for ${req.url ?? "/"}: ${err instanceof Error ? err.message : String(err)}`,
            );
          },
        });
        res.once("finish", () => resolve());
        res.once("close", () => resolve());
        serveFiles(req, res, (err?: unknown) => {
          done(err);
          resolve();
        });
      });
    },
  };
}
