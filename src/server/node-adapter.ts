import http from "node:http";
import { errorMessage } from "../utils/error";
import type { Logger } from "../utils/logger";
import { REQUEST_ID_HEADER } from "../utils/request-id";
import type { Gateway } from "./app";

/**
 * Fixed origin for inbound URLs. Routing only looks at the path, and the
 * client's Host header stays available as a header.
 */
const ORIGIN = "http://localhost";

/** Throws when the target is not origin-form (`/path?query`) or cannot be parsed. */
function toRequest(req: http.IncomingMessage): Request {
  const target = req.url ?? "";
  if (!target.startsWith("/")) throw new Error(`unsupported request target "${target}"`);

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) for (const v of value) headers.append(name, v);
    else headers.set(name, value);
  }
  // Concatenated, not resolved: "//host/path" must stay a path
  return new Request(new URL(ORIGIN + target), { method: req.method ?? "GET", headers });
}

function requestIdHeader(req: http.IncomingMessage): string | undefined {
  const v = req.headers[REQUEST_ID_HEADER];
  return typeof v === "string" ? v : undefined;
}

async function writeResponse(res: http.ServerResponse, response: Response): Promise<void> {
  const body = Buffer.from(await response.arrayBuffer());
  response.headers.forEach((value, name) => res.setHeader(name, value));
  res.setHeader("content-length", body.length);
  res.statusCode = response.status;
  res.end(body);
}

/** Adapt a Gateway to Node's `http` request listener. */
export function createRequestListener(
  gateway: Gateway,
  logger: Logger,
): (req: http.IncomingMessage, res: http.ServerResponse) => void {
  const serve = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    let request: Request;
    try {
      request = toRequest(req);
    } catch (e) {
      logger.debug("Malformed request target", { url: req.url, error: errorMessage(e) });
      await writeResponse(res, gateway.rejectMalformed(req.method ?? "GET", req.url ?? "", requestIdHeader(req)));
      return;
    }

    const response = await gateway.handle(request, controller.signal);
    if (res.destroyed || controller.signal.aborted) return;
    await writeResponse(res, response);
  };

  return (req, res) => {
    serve(req, res).catch((e: unknown) => {
      logger.error("Failed to write response", { url: req.url, error: errorMessage(e) });
      if (!res.headersSent) {
        res.statusCode = 500;
        res.end();
      } else {
        res.destroy();
      }
    });
  };
}

export interface ListenOptions {
  host: string;
  port: number;
}

/** Start listening; resolves once the socket is bound. */
export function startServer(gateway: Gateway, opts: ListenOptions, logger: Logger): Promise<http.Server> {
  const server = http.createServer(createRequestListener(gateway, logger));
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port, opts.host, () => {
      server.off("error", reject);
      const addr = server.address();
      const port = typeof addr === "object" && addr !== null ? addr.port : opts.port;
      logger.info(`Listening on http://${opts.host}:${port}`);
      resolve(server);
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((e) => (e ? reject(e) : resolve()));
    server.closeIdleConnections();
  });
}
