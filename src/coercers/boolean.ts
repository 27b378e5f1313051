import type { CoercionResult } from "../types.js";
import { BaseCoercer } from "./base.js";

const TRUTHY = new Set(["true", "1", "yes", "on"]);
const FALSY = new Set(["false", "0", "no", "off"]);

export class BooleanCoercer extends BaseCoercer<boolean> {
  constructor() {
    super("boolean");
  }

  coerce(raw: unknown): CoercionResult<boolean> {
    if (typeof raw === "boolean") return { ok: true, value: raw };
    if (raw === 1 || raw === 0) return { ok: true, value: raw === 1 };

    if (typeof raw === "string") {
      const normalized = raw.toLowerCase().trim();
      if (TRUTHY.has(normalized)) return { ok: true, value: true };
      if (FALSY.has(normalized)) return { ok: true, value: false };
    }

    return this.fail("a boolean (true/false/1/0/yes/no/on/off)", raw);
  }
}

export function boolean(): BooleanCoercer {
  return new BooleanCoercer();
}
