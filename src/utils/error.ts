/**
 * Extract error message from unknown error type.
 * Common pattern for catch blocks.
 */
export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

/** Error `code` of a Node/undici error, looking through one level of `cause`. */
export function errorCode(e: unknown): string | undefined {
  if (typeof e !== "object" || e === null) return undefined;
  if ("code" in e && typeof e.code === "string") return e.code;
  if ("cause" in e && typeof e.cause === "object" && e.cause !== null) {
    const cause = e.cause;
    if ("code" in cause && typeof cause.code === "string") return cause.code;
  }
  return undefined;
}
