import type { CoercionOptions, CoercionResult } from "../types.js";
import { BaseCoercer, readStringList } from "./base.js";

/**
 * Accepts one of a fixed set of strings. The set comes from the field's
 * `values` option, or from the constructor when registered as its own tag.
 */
export class EnumCoercer<T extends string = string> extends BaseCoercer<T> {
  private readonly _values: readonly T[] | undefined;

  constructor(values?: readonly T[]) {
    super(values ? `enum(${values.join(" | ")})` : "enum");
    this._values = values;
  }

  coerce(raw: unknown, options: CoercionOptions): CoercionResult<T> {
    const values: readonly string[] = readStringList(options, "values") ?? this._values ?? [];
    const match = values.find((value) => value === raw);

    if (match === undefined || !this.isMember(match)) {
      return this.fail(`one of [${values.map((v) => `"${v}"`).join(", ")}]`, raw);
    }

    return { ok: true, value: match };
  }

  checkOptions(options: CoercionOptions): string | undefined {
    if (options["values"] === undefined) {
      return this._values ? undefined : `Option "values" is required for enum fields`;
    }
    const values = readStringList(options, "values");
    if (!values || values.length === 0) {
      return `Option "values" must be a non-empty list of strings`;
    }
    return undefined;
  }

  values(): readonly T[] {
    return this._values ?? [];
  }

  private isMember(value: string): value is T {
    return this._values === undefined || this._values.some((member) => member === value);
  }
}

export function enumOf<T extends string>(values: readonly T[]): EnumCoercer<T> {
  return new EnumCoercer<T>(values);
}
