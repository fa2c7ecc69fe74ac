import { errorCode, errorMessage } from "./error";

export class TransportError extends Error {
  readonly url: string;
  /** Node/undici error code when known, e.g. ECONNRESET or ETIMEDOUT */
  readonly code?: string;

  constructor(message: string, opts: { url: string; code?: string; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.name = "TransportError";
    this.url = opts.url;
    this.code = opts.code;
  }
}

export interface RawResponse {
  status: number;
  body: string;
}

export interface GetTextOptions {
  /** Per-request timeout; expiry surfaces as a TransportError with code ETIMEDOUT */
  timeoutMs: number;
  userAgent: string;
  headers?: Record<string, string>;
  /** Caller cancellation; its abort is rethrown unchanged */
  signal?: AbortSignal;
}

/**
 * GET `url` and read the whole body as text, whatever the status.
 * Non-2xx responses resolve; only transport failures reject.
 */
export async function getText(url: string, opts: GetTextOptions): Promise<RawResponse> {
  // Validate URL scheme before making request
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(url);
  } catch (e) {
    throw new TransportError(`Invalid URL: ${url}`, { url, code: "ERR_INVALID_URL", cause: e });
  }

  if (!["http:", "https:"].includes(parsedUrl.protocol)) {
    throw new TransportError(
      `Invalid URL protocol "${parsedUrl.protocol}": only http: and https: are allowed`,
      { url, code: "ERR_INVALID_PROTOCOL" },
    );
  }

  const headers: Record<string, string> = {
    "user-agent": opts.userAgent,
    accept: "application/json",
    ...opts.headers,
  };

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, opts.timeoutMs);
  const onCallerAbort = () => controller.abort(opts.signal?.reason);
  if (opts.signal?.aborted) onCallerAbort();
  else opts.signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const res = await fetch(parsedUrl, { method: "GET", headers, signal: controller.signal });
    const body = await res.text();
    return { status: res.status, body };
  } catch (e) {
    if (opts.signal?.aborted) throw e;
    if (timedOut) {
      throw new TransportError(`Request timed out after ${opts.timeoutMs}ms`, {
        url,
        code: "ETIMEDOUT",
        cause: e,
      });
    }
    throw new TransportError(`Request failed: ${errorMessage(e)}`, {
      url,
      code: errorCode(e),
      cause: e,
    });
  } finally {
    clearTimeout(timeout);
    opts.signal?.removeEventListener("abort", onCallerAbort);
  }
}
