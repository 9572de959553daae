import { ConfigError } from "../errors.js";
import { resolveConfig } from "../config/loader.js";
import type { HygieneConfig } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";

export type ValidateResult =
  | { ok: true; config: HygieneConfig }
  | { ok: false; errors: Diagnostic[] };

/** Load the layered configuration and report whether it is valid. */
export function validateAll(opts: { configDir?: string; envName?: string; env?: NodeJS.ProcessEnv }): ValidateResult {
  try {
    const config = resolveConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env });
    return { ok: true, config };
  } catch (e) {
    if (e instanceof ConfigError) {
      return {
        ok: false,
        errors: [
          {
            level: "error",
            code: e.code,
            message: e.message,
            details: { configDir: opts.configDir ?? null, env: opts.envName ?? null },
          },
        ],
      };
    }
    throw e;
  }
}
