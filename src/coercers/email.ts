import type { CoercionResult } from "../types.js";
import { BaseCoercer } from "./base.js";

// RFC 5322-compliant email regex (simplified)
const EMAIL_REGEX =
  /^[a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*\.[a-zA-Z]{2,}$/;

export class EmailCoercer extends BaseCoercer<string> {
  constructor() {
    super("email");
  }

  coerce(raw: unknown): CoercionResult<string> {
    if (typeof raw !== "string" || !EMAIL_REGEX.test(raw.trim())) {
      return this.fail("a valid email address", raw);
    }

    return { ok: true, value: raw.trim() };
  }
}

export function email(): EmailCoercer {
  return new EmailCoercer();
}
