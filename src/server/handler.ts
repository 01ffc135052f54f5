import type { IncomingMessage, ServerResponse } from "node:http";
import type { Logger } from "../logging";
import { wrapError } from "../errors";
import type { RebuildGate } from "../integrity/gate";
import type { StaticFileServer } from "./staticFiles";
import { renderFailurePage } from "./failurePage";

export interface RequestHandlerOptions {
  /** Status used for the build failure page. 200 keeps browsers rendering it. */
  failureStatus?: number;
  logger?: Logger;
}

const ALLOWED_METHODS = "GET, HEAD";

/**
 * Gates every GET on a fresh build, then hands the request to the file server.
 */
export class RequestHandler {
  private readonly failureStatus: number;
  private readonly log?: Logger;

  constructor(
    private readonly gate: RebuildGate,
    private readonly files: StaticFileServer,
    options: RequestHandlerOptions = {},
  ) {
    this.failureStatus = options.failureStatus ?? 200;
    this.log = options.logger;
  }

  /** Bound so it can be passed straight to `http.createServer`. */
  readonly listener = (req: IncomingMessage, res: ServerResponse): void => {
    this.handle(req, res).catch((err: unknown) => {
      const wrapped = wrapError(err, `Serving ${req.url ?? "/"}`);
      this.log?.error(`[${wrapped.code}] ${wrapped.message}`);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "text/plain; charset=utf-8" });
      }
      res.end("Internal Server Error");
    });
  };

  async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startTime = Date.now();
    res.once("finish", () => {
      this.log?.info(
        `${req.method ?? "GET"} ${req.url ?? "/"} ${res.statusCode} ${Date.now() - startTime}ms`,
      );
    });

    const method = req.method ?? "GET";
    if (method === "HEAD") {
      await this.files.serve(req, res);
      return;
    }
    if (method !== "GET") {
      res.writeHead(405, {
        Allow: ALLOWED_METHODS,
        "Content-Type": "text/plain; charset=utf-8",
      });
      res.end("Method Not Allowed");
      return;
    }

    const freshness = await this.gate.ensureFresh();
    if (freshness.status === "failed") {
      const body = renderFailurePage(freshness.message);
      res.writeHead(this.failureStatus, {
        "Content-Type": "text/html; charset=utf-8",
        "Content-Length": Buffer.byteLength(body),
        "Cache-Control": "no-store",
      });
      res.end(body);
      return;
    }

    await this.files.serve(req, res);
  }
}
