import type { CoercionOptions, CoercionResult } from "../types.js";
import { BaseCoercer } from "./base.js";

export class StringCoercer extends BaseCoercer<string> {
  constructor() {
    super("string");
  }

  coerce(raw: unknown, options: CoercionOptions): CoercionResult<string> {
    if (typeof raw !== "string") {
      return this.fail("a string", raw);
    }

    return { ok: true, value: options["trim"] === true ? raw.trim() : raw };
  }

  checkOptions(options: CoercionOptions): string | undefined {
    const trim = options["trim"];
    if (trim !== undefined && typeof trim !== "boolean") {
      return `Option "trim" must be a boolean`;
    }
    return undefined;
  }
}

export function string(): StringCoercer {
  return new StringCoercer();
}
