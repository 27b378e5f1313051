// ─── Value Tree ───────────────────────────────────────────────────────────────

export type Scalar = string | number | boolean | null;

export type Value = Scalar | Value[] | ValueObject;

export interface ValueObject {
  [key: string]: Value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isValueObject(value: unknown): value is ValueObject {
  return isPlainObject(value) && Object.values(value).every(isValue);
}

export function isValue(value: unknown): value is Value {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      return Array.isArray(value) ? value.every(isValue) : isValueObject(value);
    default:
      return false;
  }
}

export function cloneValue<V extends Value>(value: V): V;
export function cloneValue(value: Value): Value {
  if (Array.isArray(value)) return value.map(cloneValue);
  if (value !== null && typeof value === "object") {
    const copy: ValueObject = {};
    for (const [key, inner] of Object.entries(value)) {
      copy[key] = cloneValue(inner);
    }
    return copy;
  }
  return value;
}

// ─── Merging ──────────────────────────────────────────────────────────────────

/**
 * Recursive combination of two values. Objects merge key by key, sequences
 * merge position-wise, anything else takes `next`. Neither input is mutated.
 */
export function deepMerge(base: Value | undefined, next: Value): Value {
  if (isObjectValue(base) && isObjectValue(next)) {
    const merged: ValueObject = cloneValue(base);
    for (const [key, value] of Object.entries(next)) {
      merged[key] = deepMerge(merged[key], value);
    }
    return merged;
  }

  if (Array.isArray(base) && Array.isArray(next)) {
    return mergeSequences(base, next);
  }

  return cloneValue(next);
}

/** Trailing elements of the longer sequence are kept as they are. */
export function mergeSequences(base: readonly Value[], next: readonly Value[]): Value[] {
  const length = Math.max(base.length, next.length);
  const merged: Value[] = [];

  for (let index = 0; index < length; index++) {
    const nextItem = next[index];
    const baseItem = base[index];
    if (nextItem === undefined) {
      if (baseItem !== undefined) merged.push(cloneValue(baseItem));
    } else {
      merged.push(deepMerge(baseItem, nextItem));
    }
  }

  return merged;
}

/**
 * Fills `defaults` into `target` without overriding: a key is written only
 * when it is unset or null, and two objects are filled recursively.
 */
export function fillDefaults(target: ValueObject, defaults: ValueObject): ValueObject {
  const filled: ValueObject = cloneValue(target);

  for (const [key, value] of Object.entries(defaults)) {
    const current = filled[key];
    if (current === undefined || current === null) {
      filled[key] = cloneValue(value);
    } else if (isObjectValue(current) && isObjectValue(value)) {
      filled[key] = fillDefaults(current, value);
    }
  }

  return filled;
}

export function isObjectValue(value: Value | undefined): value is ValueObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
