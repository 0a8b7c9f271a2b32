/**
 * ArgumentValidator: allow-list / deny-list check for caller arguments.
 *
 * Tokens are scanned left to right. The only state carried between tokens is
 * the two-token form (`--max-workers 4`), where the bare value following a
 * value-taking option is consumed without being classified on its own.
 * Anything not known to be safe is rejected before a process exists.
 */

import { GradleArgumentRejectedError } from "@gradle-mcp/errors";
import { SAFETY_POLICY } from "./policy.js";
import type { ArgumentClassification, ArgumentForm, SafetyPolicy } from "./types.js";

/**
 * Splits a token into its syntactic form.
 */
export function parseArgumentForm(token: string, policy: SafetyPolicy = SAFETY_POLICY): ArgumentForm {
  if (token.startsWith("--")) {
    const eq = token.indexOf("=");
    if (eq === -1) {
      return { kind: "long", token, name: token };
    }
    return { kind: "long-inline", token, name: token.slice(0, eq), value: token.slice(eq + 1) };
  }

  if (token.startsWith("-") && token.length === 2) {
    return { kind: "short", token, name: token };
  }

  if (token.startsWith("-") && token.length > 2) {
    const prefix = token.slice(0, 2);
    if (policy.fusedPrefixes.has(prefix)) {
      return { kind: "fused", token, name: prefix, value: token.slice(2) };
    }
  }

  // Plain words, "-", and combined short flags like "-is"
  return { kind: "bare", token };
}

export function classifyArgument(
  form: ArgumentForm,
  policy: SafetyPolicy = SAFETY_POLICY,
): ArgumentClassification {
  if (form.kind === "bare") return "unrecognized";
  if (policy.dangerous.has(form.name)) return "dangerous";
  if (policy.safe.has(form.name)) return "safe";
  return "unrecognized";
}

function rejectionReason(token: string, classification: ArgumentClassification, policy: SafetyPolicy): string {
  if (classification === "dangerous") {
    return (
      `Argument '${token}' is not allowed due to security concerns. ` +
      "It could enable arbitrary code execution or unauthorized file access."
    );
  }
  const allowed = [...policy.safe].sort().join(", ");
  return (
    `Argument '${token}' is not in the allow-list of safe Gradle arguments. ` +
    `Allowed arguments are: ${allowed}`
  );
}

/**
 * Validates a caller-supplied argument vector.
 *
 * @throws {GradleArgumentRejectedError} on the first dangerous or unrecognized token
 */
export function validateArguments(
  tokens: readonly string[],
  policy: SafetyPolicy = SAFETY_POLICY,
): void {
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) continue;

    const form = parseArgumentForm(token, policy);
    const classification = classifyArgument(form, policy);
    if (classification !== "safe") {
      throw new GradleArgumentRejectedError(
        token,
        classification,
        rejectionReason(token, classification, policy),
      );
    }

    if ((form.kind === "long" || form.kind === "short") && policy.valueOptions.has(form.name)) {
      const next = tokens[i + 1];
      // An empty value is left for the next iteration to reject as bare
      if (next !== undefined && next.trim() !== "" && !next.startsWith("-")) {
        i++;
      }
    }
  }
}

/**
 * Stateless validator bound to one policy.
 */
export class ArgumentValidator {
  constructor(private readonly policy: SafetyPolicy = SAFETY_POLICY) {}

  validate(tokens: readonly string[]): void {
    validateArguments(tokens, this.policy);
  }

  classify(token: string): ArgumentClassification {
    return classifyArgument(parseArgumentForm(token, this.policy), this.policy);
  }
}
