import type { CoercionOptions, CoercionResult } from "../types.js";
import { BaseCoercer } from "./base.js";

type NumberFlavor = "integer" | "float" | "decimal";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export class NumberCoercer extends BaseCoercer<number> {
  private readonly _flavor: NumberFlavor;

  constructor(flavor: NumberFlavor = "float") {
    super(flavor);
    this._flavor = flavor;
  }

  coerce(raw: unknown, options: CoercionOptions): CoercionResult<number> {
    const expected = this._flavor === "integer" ? "an integer" : "a number";
    let parsed: number;

    if (typeof raw === "number") {
      parsed = raw;
    } else if (typeof raw === "string") {
      const text = raw.trim();
      const pattern = this._flavor === "integer" ? INTEGER_PATTERN : DECIMAL_PATTERN;
      if (!pattern.test(text)) {
        return this.fail(expected, raw);
      }
      parsed = Number(text);
    } else {
      return this.fail(expected, raw);
    }

    if (!Number.isFinite(parsed)) {
      return this.fail(expected, raw);
    }

    // Integers past 2^53 cannot be held without rounding
    if (this._flavor === "integer" && !Number.isSafeInteger(parsed)) {
      return this.fail(expected, raw);
    }

    const scale = options["scale"];
    if (this._flavor === "decimal" && typeof scale === "number") {
      return { ok: true, value: Number(parsed.toFixed(scale)) };
    }

    return { ok: true, value: parsed };
  }

  checkOptions(options: CoercionOptions): string | undefined {
    const scale = options["scale"];
    if (scale === undefined) return undefined;
    if (this._flavor !== "decimal") {
      return `Option "scale" only applies to decimal fields`;
    }
    if (typeof scale !== "number" || !Number.isInteger(scale) || scale < 0 || scale > 100) {
      return `Option "scale" must be an integer between 0 and 100`;
    }
    return undefined;
  }
}

export function integer(): NumberCoercer {
  return new NumberCoercer("integer");
}

export function float(): NumberCoercer {
  return new NumberCoercer("float");
}

export function decimal(): NumberCoercer {
  return new NumberCoercer("decimal");
}
