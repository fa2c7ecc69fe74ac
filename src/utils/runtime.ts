import type { RuntimeOptions } from "../types";

/** Create RuntimeOptions from process environment */
export function createRuntimeFromEnv(): RuntimeOptions {
  return {
    cwd: process.cwd(),
    env: process.env,
  };
}
