/**
 * Process-wide safety policy.
 *
 * Built once from the option lists at module load and frozen. Changing what
 * callers may pass is a code change to `constants.ts`, never a runtime call.
 */

import { DANGEROUS_OPTIONS, SAFE_OPTIONS } from "./constants.js";
import type { OptionSpec, SafetyPolicy } from "./types.js";

function namesOf(spec: OptionSpec): string[] {
  return spec.short !== undefined ? [spec.long, spec.short] : [spec.long];
}

/**
 * Builds a frozen {@link SafetyPolicy}.
 *
 * @throws {Error} if an option name appears in both lists
 */
export function createSafetyPolicy(
  safeOptions: readonly OptionSpec[],
  dangerousOptions: readonly OptionSpec[],
): SafetyPolicy {
  const safe = new Set(safeOptions.flatMap(namesOf));
  const dangerous = new Set(dangerousOptions.flatMap(namesOf));

  for (const name of dangerous) {
    if (safe.has(name)) {
      throw new Error(`Option "${name}" is listed as both safe and dangerous`);
    }
  }

  const all = [...safeOptions, ...dangerousOptions];
  const valueOptions = new Set(all.filter((o) => o.takesValue).flatMap(namesOf));

  // Only single-letter value options can be written fused (-Pkey=value)
  const fusedPrefixes = new Set(
    all.flatMap((o) => (o.takesValue && o.short !== undefined ? [o.short] : [])),
  );

  return Object.freeze({
    safe,
    dangerous,
    valueOptions,
    fusedPrefixes,
  });
}

export const SAFETY_POLICY: SafetyPolicy = createSafetyPolicy(SAFE_OPTIONS, DANGEROUS_OPTIONS);
