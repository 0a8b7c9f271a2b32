/**
 * Zod-based configuration validation and resolution.
 */

import { existsSync } from "node:fs";
import { isAbsolute, join, resolve } from "node:path";
import { GradleWrapperNotFoundError, ValidationError } from "@gradle-mcp/errors";
import { z } from "zod";
import { CONSOLE_MODES, DEFAULT_KILL_GRACE_MS, DEFAULT_RUN_FLAGS } from "./constants.js";
import type { ResolvedGradleConfig } from "./types.js";

export const GradleConfigSchema = z.object({
  projectRoot: z.string().min(1),
  wrapperPath: z.string().min(1).optional(),
  runFlags: z.array(z.string().min(1)).optional(),
  console: z.enum(CONSOLE_MODES).optional(),
  timeoutMs: z.number().int().positive().optional(),
  killGraceMs: z.number().int().nonnegative().optional(),
  env: z.record(z.string()).optional(),
});

export type GradleConfig = z.input<typeof GradleConfigSchema>;

export interface ResolveGradleConfigOptions {
  readonly platform?: NodeJS.Platform;
  readonly fileExists?: (path: string) => boolean;
}

export function defaultWrapperName(platform: NodeJS.Platform): string {
  return platform === "win32" ? "gradlew.bat" : "gradlew";
}

/**
 * Validates a raw config object and applies defaults. The wrapper path is
 * resolved against the project root and must exist.
 *
 * @throws {ValidationError} with code GRADLE_CONFIGURATION_INVALID on schema failure
 * @throws {GradleWrapperNotFoundError} when no wrapper script is present
 */
export function resolveGradleConfig(
  raw: unknown,
  options: ResolveGradleConfigOptions = {},
): ResolvedGradleConfig {
  const result = GradleConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      field: i.path.join("."),
      message: i.message,
      code: i.code,
    }));
    throw new ValidationError({
      code: "GRADLE_CONFIGURATION_INVALID",
      message: `Invalid Gradle config: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues,
    });
  }

  const config = result.data;
  const projectRoot = resolve(config.projectRoot);
  const platform = options.platform ?? process.platform;
  const wrapperPath = config.wrapperPath
    ? isAbsolute(config.wrapperPath)
      ? config.wrapperPath
      : join(projectRoot, config.wrapperPath)
    : join(projectRoot, defaultWrapperName(platform));

  const fileExists = options.fileExists ?? existsSync;
  if (!fileExists(wrapperPath)) {
    throw new GradleWrapperNotFoundError(
      wrapperPath,
      "Set GRADLE_WRAPPER or GRADLE_PROJECT_ROOT to point at a project with a Gradle wrapper.",
    );
  }

  return {
    projectRoot,
    wrapperPath,
    runFlags: config.runFlags ?? [...DEFAULT_RUN_FLAGS],
    ...(config.console !== undefined ? { console: config.console } : {}),
    ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
    killGraceMs: config.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
    ...(config.env !== undefined ? { env: config.env } : {}),
  };
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

/**
 * Reads configuration from the environment:
 * GRADLE_PROJECT_ROOT (default: cwd), GRADLE_WRAPPER, GRADLE_TIMEOUT_MS, GRADLE_CONSOLE.
 */
export function loadGradleConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  options: ResolveGradleConfigOptions & { readonly cwd?: string } = {},
): ResolvedGradleConfig {
  const raw = {
    projectRoot: env.GRADLE_PROJECT_ROOT || (options.cwd ?? process.cwd()),
    wrapperPath: env.GRADLE_WRAPPER || undefined,
    timeoutMs: parseOptionalNumber(env.GRADLE_TIMEOUT_MS),
    console: env.GRADLE_CONSOLE || undefined,
  };
  return resolveGradleConfig(raw, options);
}
