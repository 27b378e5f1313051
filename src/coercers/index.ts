import type { BuiltinTypeTag, TypeCoercer } from "../types.js";
import { AnyCoercer, MapCoercer } from "./any.js";
import { BooleanCoercer } from "./boolean.js";
import { EmailCoercer } from "./email.js";
import { EnumCoercer } from "./enum.js";
import { NumberCoercer } from "./number.js";
import { StringCoercer } from "./string.js";
import { DateCoercer, DateTimeCoercer } from "./temporal.js";
import { UrlCoercer } from "./url.js";
import { UuidCoercer } from "./uuid.js";

export { string, StringCoercer } from "./string.js";
export { integer, float, decimal, NumberCoercer } from "./number.js";
export { boolean, BooleanCoercer } from "./boolean.js";
export { url, UrlCoercer } from "./url.js";
export { email, EmailCoercer } from "./email.js";
export { enumOf, EnumCoercer } from "./enum.js";
export { date, datetime, DateCoercer, DateTimeCoercer } from "./temporal.js";
export { uuid, UuidCoercer } from "./uuid.js";
export { AnyCoercer, MapCoercer } from "./any.js";
export { BaseCoercer, CustomCoercer, isTypeCoercer, describeRaw } from "./base.js";

export const BUILTIN_COERCERS: Readonly<Record<BuiltinTypeTag, TypeCoercer>> = Object.freeze({
  string: new StringCoercer(),
  integer: new NumberCoercer("integer"),
  float: new NumberCoercer("float"),
  decimal: new NumberCoercer("decimal"),
  boolean: new BooleanCoercer(),
  date: new DateCoercer(),
  datetime: new DateTimeCoercer(),
  uuid: new UuidCoercer(),
  binary_id: new UuidCoercer("binary_id"),
  email: new EmailCoercer(),
  url: new UrlCoercer(),
  enum: new EnumCoercer(),
  any: new AnyCoercer(),
  map: new MapCoercer(),
});
