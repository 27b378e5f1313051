import type { Change } from "./result.js";
import { isResultList, ValidationResult } from "./result.js";
import type { ValidationHook } from "./types.js";
import type { Scalar, Value } from "./value.js";

// ─── Hook Plumbing ────────────────────────────────────────────────────────────

/** Accepts whatever the built-in pass produced. */
export const identityHook: ValidationHook = (result) => result;

/** Runs hooks left to right, each receiving the previous one's result. */
export function composeHooks(...hooks: ValidationHook[]): ValidationHook {
  return (result, raw) => hooks.reduce((acc, hook) => hook(acc, raw), result);
}

// ─── Validations ──────────────────────────────────────────────────────────────
// Helpers for hooks. Each one appends errors to the result it is given and
// returns it. Apart from validateRequired they only look at changes.

export function validateRequired(
  result: ValidationResult,
  names: readonly string[],
  message = "can't be blank",
): ValidationResult {
  for (const name of names) {
    result.schema.requireField(name);
    if (result.hasError(name)) continue;
    if (isBlankChange(result.fetchField(name))) {
      result.addError(name, "missing_required", message, { code: "required" });
    }
  }
  return result;
}

export function validateInclusion(
  result: ValidationResult,
  name: string,
  values: readonly Scalar[],
  message = "is invalid",
): ValidationResult {
  const value = scalarChange(result, name);
  if (value !== undefined && !values.includes(value)) {
    result.addError(name, "user_rule", message, { received: value, code: "inclusion" });
  }
  return result;
}

export function validateExclusion(
  result: ValidationResult,
  name: string,
  values: readonly Scalar[],
  message = "is reserved",
): ValidationResult {
  const value = scalarChange(result, name);
  if (value !== undefined && values.includes(value)) {
    result.addError(name, "user_rule", message, { received: value, code: "exclusion" });
  }
  return result;
}

export interface NumberBounds {
  min?: number | undefined;
  max?: number | undefined;
}

export function validateNumber(
  result: ValidationResult,
  name: string,
  bounds: NumberBounds,
): ValidationResult {
  const value = scalarChange(result, name);
  if (typeof value !== "number") return result;

  if (bounds.min !== undefined && value < bounds.min) {
    result.addError(name, "user_rule", `must be at least ${bounds.min}`, { received: value, code: "number" });
  } else if (bounds.max !== undefined && value > bounds.max) {
    result.addError(name, "user_rule", `must be at most ${bounds.max}`, { received: value, code: "number" });
  }
  return result;
}

/** String length, or item count for lists and embeds_many. */
export function validateLength(
  result: ValidationResult,
  name: string,
  bounds: NumberBounds,
): ValidationResult {
  const change = result.getChange(name);
  let length: number;
  if (typeof change === "string") {
    length = [...change].length;
  } else if (Array.isArray(change) || isResultList(change)) {
    length = change.length;
  } else {
    return result;
  }

  if (bounds.min !== undefined && length < bounds.min) {
    result.addError(name, "user_rule", `should have at least ${bounds.min} item(s)`, {
      received: length,
      code: "length",
    });
  } else if (bounds.max !== undefined && length > bounds.max) {
    result.addError(name, "user_rule", `should have at most ${bounds.max} item(s)`, {
      received: length,
      code: "length",
    });
  }
  return result;
}

/** Runs `check` on a plain value change; a returned string becomes the error message. */
export function validateChange(
  result: ValidationResult,
  name: string,
  check: (value: Value) => string | undefined,
  code = "custom",
): ValidationResult {
  const change = result.getChange(name);
  if (change === undefined || change instanceof ValidationResult || isResultList(change)) {
    return result;
  }
  const message = check(change);
  if (message !== undefined) {
    result.addError(name, "user_rule", message, { received: change, code });
  }
  return result;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function scalarChange(result: ValidationResult, name: string): Scalar | undefined {
  const change = result.getChange(name);
  if (
    typeof change === "string" ||
    typeof change === "number" ||
    typeof change === "boolean"
  ) {
    return change;
  }
  return undefined;
}

function isBlankChange(value: Change | undefined): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.trim() === "";
  return isResultList(value) && value.length === 0;
}
