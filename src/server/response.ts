import type { Pokemon } from "../types";
import type { FetchError } from "../upstream/errors";

const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

/** Wire shape of a lookup result. */
export interface PokemonBody {
  name: string;
  height: number;
  weight: number;
  base_experience: number;
}

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    request_id: string;
  };
}

export const pokemonBody = (p: Pokemon): PokemonBody => ({
  name: p.name,
  height: p.height,
  weight: p.weight,
  base_experience: p.baseExperience,
});

export const jsonResponse = (data: unknown, status = 200, headers?: Record<string, string>): Response =>
  new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": JSON_CONTENT_TYPE, ...headers },
  });

export const textResponse = (text: string, status = 200, contentType = "text/plain; charset=utf-8"): Response =>
  new Response(text, { status, headers: { "content-type": contentType } });

/** Unified error envelope. */
export function errorResponse(
  status: number,
  code: string,
  message: string,
  requestId: string,
  headers?: Record<string, string>,
): Response {
  const body: ErrorBody = { error: { code, message, request_id: requestId } };
  return jsonResponse(body, status, headers);
}

interface ErrorMapping {
  status: number;
  code: string;
  message: (e: FetchError) => string;
}

const FETCH_ERROR_MAP: Record<FetchError["kind"], ErrorMapping> = {
  not_found: { status: 404, code: "not_found", message: () => "pokemon not found" },
  upstream_status: { status: 502, code: "upstream_error", message: (e) => e.message },
  upstream_unavailable: { status: 502, code: "upstream_unavailable", message: (e) => e.message },
  cancelled: { status: 504, code: "request_cancelled", message: (e) => e.message },
  decode_failure: { status: 502, code: "upstream_decode_error", message: (e) => e.message },
};

export function fetchErrorResponse(e: FetchError, requestId: string): Response {
  const m = FETCH_ERROR_MAP[e.kind];
  return errorResponse(m.status, m.code, m.message(e), requestId);
}
