import crypto from "node:crypto";

export const REQUEST_ID_HEADER = "x-request-id";

const ACCEPTED_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/** 16 random bytes, hex-encoded (32 chars). */
export function generateRequestId(): string {
  return crypto.randomBytes(16).toString("hex");
}

/**
 * Reuse the caller's correlation ID when it is a short token of safe characters,
 * otherwise mint a new one.
 */
export function resolveRequestId(incoming: string | null | undefined): string {
  const candidate = incoming?.trim();
  if (candidate && ACCEPTED_ID.test(candidate)) return candidate;
  return generateRequestId();
}
