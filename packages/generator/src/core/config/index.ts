/**
 * Generator Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated up front — fail fast if misconfigured.
 */

import { z } from "zod";
import type { LogLevel } from "@ormgen/contracts";

export interface GeneratorConfig {
  /**
   * Namespace every generated module lives under (e.g. "Blog" → Blog.Post)
   */
  modulePrefix: string;

  /** Minimum level the generator's logger emits */
  logLevel: LogLevel;
}

const configSchema = z.object({
  modulePrefix: z
    .string()
    .regex(
      /^[A-Z][A-Za-z0-9]*(\.[A-Z][A-Za-z0-9]*)*$/,
      "must be a dotted PascalCase module path (e.g. MyApp.Schema)"
    ),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
});

/**
 * Loads configuration from process.env (or the given environment).
 * Throws immediately if a variable is set to an invalid value.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): GeneratorConfig {
  const result = configSchema.safeParse({
    modulePrefix: env.ORMGEN_MODULE_PREFIX ?? "App",
    logLevel: env.ORMGEN_LOG_LEVEL ?? "info",
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid generator configuration. ${details}`);
  }

  return result.data;
}
