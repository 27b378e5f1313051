// ─── Core API ─────────────────────────────────────────────────────────────────
export { defineParams, cast, checkParams, ParamsSchema } from "./schema.js";
export type { SchemaIntrospection, IntrospectedField } from "./schema.js";

// ─── Schema Compilation ───────────────────────────────────────────────────────
export { compile, Schema, SchemaDefinitionError, embedsOne, embedsMany, field } from "./compiler.js";
export type { SchemaHolder } from "./compiler.js";
export type { FieldDescriptor, FieldKind } from "./field.js";

// ─── Casting & Projection ─────────────────────────────────────────────────────
export { castChangeset } from "./caster.js";
export { project, toMap, toStruct } from "./projector.js";
export { ValidationResult, formatPath } from "./result.js";
export type { Change, Presence } from "./result.js";

// ─── Hooks ────────────────────────────────────────────────────────────────────
export {
  composeHooks,
  validateRequired,
  validateInclusion,
  validateExclusion,
  validateNumber,
  validateLength,
  validateChange,
} from "./hooks.js";
export type { NumberBounds } from "./hooks.js";

// ─── Coercers ─────────────────────────────────────────────────────────────────
export {
  string,
  StringCoercer,
  integer,
  float,
  decimal,
  NumberCoercer,
  boolean,
  BooleanCoercer,
  url,
  UrlCoercer,
  email,
  EmailCoercer,
  enumOf,
  EnumCoercer,
  date,
  datetime,
  DateCoercer,
  DateTimeCoercer,
  uuid,
  UuidCoercer,
  AnyCoercer,
  MapCoercer,
  BaseCoercer,
  CustomCoercer,
} from "./coercers/index.js";

// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  TypeCoercer,
  CoercionResult,
  CoercionSuccess,
  CoercionFailure,
  CoercionOptions,
  TypeTag,
  BuiltinTypeTag,
  FieldSpec,
  SchemaDescription,
  InferStruct,
  InferMap,
  RawInput,
  ParamError,
  ErrorKind,
  PathSegment,
  ValidationHook,
  CastMode,
  CastOptions,
  ChangesetOptions,
  CompileOptions,
  CastResult,
} from "./types.js";
export type { Value, ValueObject, Scalar } from "./value.js";

// ─── Errors ───────────────────────────────────────────────────────────────────
export { ParamsValidationError } from "./formatter.js";

// ─── Re-export formatters for advanced usage ──────────────────────────────────
export { formatErrors, formatSuccess } from "./formatter.js";
