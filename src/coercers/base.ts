import type { CoercionOptions, CoercionResult, TypeCoercer } from "../types.js";
import type { Value } from "../value.js";

export abstract class BaseCoercer<T extends Value> implements TypeCoercer<T> {
  readonly _type: string;

  constructor(type: string) {
    this._type = type;
  }

  abstract coerce(raw: unknown, options: CoercionOptions): CoercionResult<T>;

  checkOptions(_options: CoercionOptions): string | undefined {
    return undefined;
  }

  protected fail(expected: string, raw: unknown): CoercionResult<T> {
    return { ok: false, error: `Expected ${expected}, got ${describeRaw(raw)}` };
  }
}

// ─── Custom Coercer ───────────────────────────────────────────────────────────

export class CustomCoercer<T extends Value> extends BaseCoercer<T> {
  private readonly _fn: (raw: unknown, options: CoercionOptions) => CoercionResult<T>;

  constructor(
    fn: (raw: unknown, options: CoercionOptions) => CoercionResult<T>,
    typeName = "custom",
  ) {
    super(typeName);
    this._fn = fn;
  }

  coerce(raw: unknown, options: CoercionOptions): CoercionResult<T> {
    return this._fn(raw, options);
  }
}

export function isTypeCoercer(value: unknown): value is TypeCoercer {
  return (
    typeof value === "object" &&
    value !== null &&
    "_type" in value &&
    "coerce" in value &&
    typeof value.coerce === "function"
  );
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function describeRaw(raw: unknown): string {
  if (typeof raw === "string") return `"${raw}"`;
  if (raw === null) return "null";
  if (Array.isArray(raw)) return "an array";
  if (typeof raw === "object") return "an object";
  if (typeof raw === "number" || typeof raw === "boolean") return String(raw);
  return typeof raw;
}

export function readStringList(options: CoercionOptions, key: string): string[] | undefined {
  const value = options[key];
  if (!Array.isArray(value)) return undefined;
  const list: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") return undefined;
    list.push(item);
  }
  return list;
}
