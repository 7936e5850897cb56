import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import type { ProvenantConfig } from "../types/config.js";
import { toFailure, type CommandFailure, type CommonOpts } from "./context.js";
import { EXIT } from "./exit-codes.js";

export type ConfigShowResult = { ok: true; config: ProvenantConfig } | CommandFailure;

/** Merged and validated tool configuration. */
export function configShow(opts: Pick<CommonOpts, "configDir" | "env">): ConfigShowResult {
  try {
    const result = validateConfig(loadConfig({ configDir: opts.configDir, envName: opts.env }));
    if (!result.valid) {
      return { ok: false, error: { code: "CONFIG_INVALID", message: result.errors }, exitCode: EXIT.INVALID_ARGS };
    }
    return { ok: true, config: result.config };
  } catch (e) {
    return toFailure(e);
  }
}
