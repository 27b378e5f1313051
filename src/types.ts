import type { Schema } from "./compiler.js";
import type { ValidationResult } from "./result.js";
import type { Value, ValueObject } from "./value.js";

// ─── Coercion Result ──────────────────────────────────────────────────────────

export type CoercionSuccess<T> = { ok: true; value: T };
export type CoercionFailure = { ok: false; error: string };
export type CoercionResult<T> = CoercionSuccess<T> | CoercionFailure;

// ─── Coercer Shape ────────────────────────────────────────────────────────────

/** Per-field options handed to the coercer untouched (e.g. `scale`, `values`). */
export type CoercionOptions = Readonly<Record<string, Value>>;

export interface TypeCoercer<T extends Value = Value> {
  readonly _type: string;
  coerce(raw: unknown, options: CoercionOptions): CoercionResult<T>;
  /** Returns a message when the options cannot be used with this coercer. */
  checkOptions?(options: CoercionOptions): string | undefined;
}

// ─── Schema Description ───────────────────────────────────────────────────────

export type BuiltinTypeTag =
  | "string"
  | "integer"
  | "float"
  | "decimal"
  | "boolean"
  | "date"
  | "datetime"
  | "uuid"
  | "binary_id"
  | "email"
  | "url"
  | "enum"
  | "any"
  | "map";

export type TypeTag = BuiltinTypeTag | (string & {});

export interface EmbedsOneSpec<D extends SchemaDescription = SchemaDescription> {
  readonly embeds_one: Schema<D>;
}

export interface EmbedsManySpec<D extends SchemaDescription = SchemaDescription> {
  readonly embeds_many: Schema<D>;
}

export type BareFieldSpec =
  | TypeTag
  | readonly [TypeTag]
  | SchemaDescription
  | readonly [SchemaDescription]
  | EmbedsOneSpec
  | EmbedsManySpec;

export interface FieldOptionsSpec {
  readonly field: BareFieldSpec;
  readonly default?: Value;
  readonly [option: string]: unknown;
}

export type FieldSpec = BareFieldSpec | readonly [FieldOptionsSpec];

/** Field names ending in `!` are required. */
export interface SchemaDescription {
  readonly [name: string]: FieldSpec;
}

// ─── Inferred Types ───────────────────────────────────────────────────────────

export interface ScalarTypeMap {
  string: string;
  integer: number;
  float: number;
  decimal: number;
  boolean: boolean;
  date: string;
  datetime: string;
  uuid: string;
  binary_id: string;
  email: string;
  url: string;
  enum: string;
  any: Value;
  map: ValueObject;
}

export type InferTag<T> = T extends keyof ScalarTypeMap ? ScalarTypeMap[T] : Value;

export type FieldName<K> = K extends `${infer N}!` ? N : K;

type InferStructField<F> = F extends readonly [{ readonly field: infer Inner }]
  ? InferStructField<Inner>
  : F extends { readonly embeds_many: Schema<infer D> }
    ? InferStruct<D>[]
    : F extends { readonly embeds_one: Schema<infer D> }
      ? InferStruct<D> | null
      : F extends readonly [infer E]
        ? E extends string
          ? InferTag<E>[] | null
          : InferStruct<E>[]
        : F extends string
          ? InferTag<F> | null
          : InferStruct<F> | null;

type InferMapField<F> = F extends readonly [{ readonly field: infer Inner }]
  ? InferMapField<Inner>
  : F extends { readonly embeds_many: Schema<infer D> }
    ? InferMap<D>[] | null
    : F extends { readonly embeds_one: Schema<infer D> }
      ? InferMap<D> | null
      : F extends readonly [infer E]
        ? E extends string
          ? InferTag<E>[] | null
          : InferMap<E>[] | null
        : F extends string
          ? InferTag<F> | null
          : InferMap<F> | null;

/** Output of a struct-mode cast: every field present, absent ones as `null`. */
export type InferStruct<S> = {
  [K in keyof S as FieldName<K & string>]: InferStructField<S[K]>;
};

/** Output of a map-mode cast: only supplied or defaulted fields are present. */
export type InferMap<S> = {
  [K in keyof S as FieldName<K & string>]?: InferMapField<S[K]>;
};

// ─── Raw Input ────────────────────────────────────────────────────────────────

export type RawInput = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

// ─── Error Types ──────────────────────────────────────────────────────────────

export type ErrorKind = "missing_required" | "type_mismatch" | "invalid_relation" | "user_rule";

export type PathSegment = string | number;

export interface ParamError {
  path: readonly PathSegment[];
  /** Rendered path, e.g. `near_locations[1].latitude` */
  key: string;
  kind: ErrorKind;
  message: string;
  received: unknown;
  expected: string | undefined;
  /** Rule code set by hook validations */
  code: string | undefined;
}

// ─── Hooks & Options ──────────────────────────────────────────────────────────

export type ValidationHook = (result: ValidationResult, raw: RawInput) => ValidationResult;

export type CastMode = "map" | "struct";

export interface ChangesetOptions {
  /** Replaces the schema's own hook for this call */
  hook?: ValidationHook | undefined;
  /** Pre-existing data the cast is applied to (default: `{}`) */
  data?: ValueObject | undefined;
}

export interface CastOptions extends ChangesetOptions {
  /** Output projection (default: "map") */
  mode?: CastMode | undefined;
}

export interface CompileOptions {
  /** Runs after the built-in pass on every cast of this schema */
  hook?: ValidationHook | undefined;
  /** Extra or overriding coercers by type tag, inherited by inline embeds */
  coercers?: Readonly<Record<string, TypeCoercer>> | undefined;
}

export type CastResult<T> = { ok: true; value: T } | { ok: false; error: ValidationResult };
