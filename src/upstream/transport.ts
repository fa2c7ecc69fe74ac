import { getText, type RawResponse } from "../utils/http";

export type { RawResponse };

/**
 * One raw call to the upstream for `key`.
 * Resolves with whatever status the upstream answered; rejects only on transport failure
 * (or with the signal's reason when `signal` aborts).
 */
export interface UpstreamTransport {
  request(key: string, signal?: AbortSignal): Promise<RawResponse>;
}

export interface PokeApiTransportOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT = "pokegate";

export class PokeApiTransport implements UpstreamTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(opts: PokeApiTransportOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs;
    this.userAgent = opts.userAgent ?? DEFAULT_USER_AGENT;
  }

  urlFor(key: string): string {
    return `${this.baseUrl}/pokemon/${encodeURIComponent(key)}`;
  }

  request(key: string, signal?: AbortSignal): Promise<RawResponse> {
    return getText(this.urlFor(key), {
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
      signal,
    });
  }
}
