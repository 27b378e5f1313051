import type { CoercionResult } from "../types.js";
import type { Value, ValueObject } from "../value.js";
import { isValue, isValueObject } from "../value.js";
import { BaseCoercer } from "./base.js";

/** Passes through any JSON-like value. */
export class AnyCoercer extends BaseCoercer<Value> {
  constructor() {
    super("any");
  }

  coerce(raw: unknown): CoercionResult<Value> {
    return isValue(raw) ? { ok: true, value: raw } : this.fail("a JSON-compatible value", raw);
  }
}

/** A free-form object, not validated against a schema. */
export class MapCoercer extends BaseCoercer<ValueObject> {
  constructor() {
    super("map");
  }

  coerce(raw: unknown): CoercionResult<ValueObject> {
    return isValueObject(raw) ? { ok: true, value: raw } : this.fail("an object", raw);
  }
}
