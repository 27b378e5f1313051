import type { CoercionResult } from "../types.js";
import { BaseCoercer } from "./base.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export class UuidCoercer extends BaseCoercer<string> {
  constructor(type = "uuid") {
    super(type);
  }

  coerce(raw: unknown): CoercionResult<string> {
    if (typeof raw !== "string" || !UUID_PATTERN.test(raw.trim())) {
      return this.fail("a UUID", raw);
    }

    return { ok: true, value: raw.trim().toLowerCase() };
  }
}

export function uuid(): UuidCoercer {
  return new UuidCoercer();
}
