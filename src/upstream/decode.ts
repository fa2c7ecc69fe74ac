import type { Pokemon } from "../types";
import { errorMessage } from "../utils/error";
import { err, ok, type Result } from "../utils/result";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Decode a 200 body into a Pokemon.
 * `base_experience` is null for some upstream forms; null or absent decodes to 0.
 */
export function decodePokemon(body: string): Result<Pokemon, string> {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (e) {
    return err(`invalid JSON: ${errorMessage(e)}`);
  }
  if (!isRecord(raw)) return err("expected a JSON object");

  const { name, height, weight } = raw;
  const baseExperience = raw.base_experience ?? 0;

  if (typeof name !== "string") return err(`'name' must be a string (got ${typeof name})`);
  if (!Number.isInteger(height)) return err(`'height' must be an integer`);
  if (!Number.isInteger(weight)) return err(`'weight' must be an integer`);
  if (!Number.isInteger(baseExperience)) return err(`'base_experience' must be an integer`);

  return ok(
    Object.freeze({
      name,
      height: Number(height),
      weight: Number(weight),
      baseExperience: Number(baseExperience),
    }),
  );
}
