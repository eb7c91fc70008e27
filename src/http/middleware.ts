/**
 * Request logging for Node HTTP handlers
 * One request handle per request, ended with route, status and duration
 */

import type { Aggregator } from "../aggregator/aggregator.js";
import type { RequestHandle } from "../aggregator/handles.js";
import type { DiagnosticLog } from "../utils/logger.js";

/** The parts of http.IncomingMessage the middleware reads */
export interface RequestLike {
  method?: string;
  url?: string;
  headers: NodeJS.Dict<string | string[]>;
}

/** The parts of http.ServerResponse the middleware uses */
export interface ResponseLike {
  statusCode: number;
  headersSent: boolean;
  once(event: "finish" | "close", listener: () => void): unknown;
  end(): unknown;
}

export type LoggedHandler<Req extends RequestLike, Res extends ResponseLike> = (
  req: Req,
  res: Res,
  log: RequestHandle,
) => void | Promise<void>;

export interface RequestLogOptions<Req extends RequestLike = RequestLike> {
  /** Header carrying an upstream request id (default: x-request-id) */
  idHeader?: string;
  /** Route label for the record (default: "METHOD path") */
  route?: (req: Req) => string;
  /** Diagnostics for handler failures */
  logger?: DiagnosticLog;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/** Strip the query string from a request URL */
function pathOf(url: string | undefined): string {
  if (!url) return "/";
  const idx = url.indexOf("?");
  return idx === -1 ? url : url.slice(0, idx);
}

function defaultRoute(req: RequestLike): string {
  return `${req.method ?? "GET"} ${pathOf(req.url)}`;
}

function headerValue(req: RequestLike, name: string): string | undefined {
  const value = req.headers[name.toLowerCase()];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.length > 0 ? first : undefined;
}

/**
 * Wrap a handler so each request records into its own thread.
 * The record is emitted once, when the response finishes or the connection closes.
 */
export function withRequestLog<Req extends RequestLike, Res extends ResponseLike>(
  aggregator: Aggregator,
  handler: LoggedHandler<Req, Res>,
  options: RequestLogOptions<Req> = {},
): (req: Req, res: Res) => Promise<void> {
  const idHeader = options.idHeader ?? "x-request-id";
  const routeOf = options.route ?? defaultRoute;
  const now = options.now ?? Date.now;

  return async (req, res) => {
    const startTime = now();
    const log = aggregator.newRequest(headerValue(req, idHeader));
    const route = routeOf(req);
    let ended = false;

    const end = () => {
      if (ended) return;
      ended = true;
      log.end(route, res.statusCode, now() - startTime);
    };
    res.once("finish", end);
    res.once("close", end);

    try {
      await handler(req, res, log);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Unhandled error: ${message}`);
      options.logger?.error(`Handler failed: ${message}`, { threadId: log.id, route });
      if (!res.headersSent) {
        res.statusCode = 500;
        res.end();
      }
    }
  };
}
