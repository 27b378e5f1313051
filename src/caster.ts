import { describeRaw } from "./coercers/base.js";
import type { Schema } from "./compiler.js";
import type { FieldDescriptor, RelationKind, ScalarKind } from "./field.js";
import { describeKind, isRelation, isScalar } from "./field.js";
import { identityHook } from "./hooks.js";
import { ValidationResult } from "./result.js";
import type { PathSegment, RawInput, ValidationHook } from "./types.js";
import type { Value, ValueObject } from "./value.js";
import { isPlainObject } from "./value.js";

const BLANK_MESSAGE = "can't be blank";
const INDEX_KEY = /^\d+$/;

type Lookup = { found: false } | { found: true; value: unknown };

interface FieldBuckets {
  requiredScalars: FieldDescriptor<ScalarKind>[];
  optionalScalars: FieldDescriptor<ScalarKind>[];
  requiredRelations: FieldDescriptor<RelationKind>[];
  optionalRelations: FieldDescriptor<RelationKind>[];
}

/**
 * Casts raw input against a schema. Never throws for invalid input: every
 * field and every embedded element is evaluated and all failures end up on
 * the returned (sealed) result.
 */
export function castChangeset(
  schema: Schema,
  target: ValueObject,
  raw: RawInput,
  hook: ValidationHook | undefined,
): ValidationResult {
  const result = new ValidationResult(schema, target);
  const buckets = partitionFields(schema);

  for (const field of buckets.requiredScalars) castScalarField(result, field, raw);
  for (const field of buckets.optionalScalars) castScalarField(result, field, raw);
  for (const field of buckets.requiredRelations) castRelationField(result, field, raw);
  for (const field of buckets.optionalRelations) castRelationField(result, field, raw);

  return (hook ?? identityHook)(result, raw).seal();
}

export function partitionFields(schema: Schema): FieldBuckets {
  const buckets: FieldBuckets = {
    requiredScalars: [],
    optionalScalars: [],
    requiredRelations: [],
    optionalRelations: [],
  };

  for (const field of schema.fields.values()) {
    if (isRelation(field)) {
      (field.required ? buckets.requiredRelations : buckets.optionalRelations).push(field);
    } else if (isScalar(field)) {
      (field.required ? buckets.requiredScalars : buckets.optionalScalars).push(field);
    }
  }

  return buckets;
}

// ─── Raw Input ────────────────────────────────────────────────────────────────

export function isRawInput(value: unknown): value is RawInput {
  return isPlainObject(value) || value instanceof Map;
}

export function lookupParam(raw: RawInput, name: string): Lookup {
  if (raw instanceof Map) {
    return raw.has(name) ? { found: true, value: raw.get(name) } : { found: false };
  }
  if (isPlainObject(raw) && Object.hasOwn(raw, name)) {
    return { found: true, value: raw[name] };
  }
  return { found: false };
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === "string" && value.trim() === "");
}

// ─── Scalars ──────────────────────────────────────────────────────────────────

function castScalarField(
  result: ValidationResult,
  field: FieldDescriptor<ScalarKind>,
  raw: RawInput,
): void {
  const lookup = lookupParam(raw, field.name);

  if (!lookup.found) {
    // A declared default satisfies the required check; an explicit null does not
    if (field.required && field.default === undefined) missing(result, [field.name], field);
    return;
  }

  if (isBlank(lookup.value)) {
    result.markPresence(field.name, "null");
    if (field.required) missing(result, [field.name], field);
    return;
  }

  result.markPresence(field.name, "value");
  const { kind } = field;

  if (kind.type === "scalar") {
    const coerced = kind.coercer.coerce(lookup.value, field.coercionOptions);
    if (coerced.ok) {
      result.putChange(field.name, coerced.value);
    } else {
      result.addError(field.name, "type_mismatch", coerced.error, {
        received: lookup.value,
        expected: kind.tag,
      });
    }
    return;
  }

  if (!Array.isArray(lookup.value)) {
    result.addError(field.name, "type_mismatch", `Expected a list, got ${describeRaw(lookup.value)}`, {
      received: lookup.value,
      expected: describeKind(kind),
    });
    return;
  }

  const items: Value[] = [];
  let failed = false;

  lookup.value.forEach((item: unknown, index: number) => {
    if (item === null || item === undefined) {
      items.push(null);
      return;
    }
    const coerced = kind.coercer.coerce(item, field.coercionOptions);
    if (coerced.ok) {
      items.push(coerced.value);
    } else {
      failed = true;
      result.addError([field.name, index], "type_mismatch", coerced.error, {
        received: item,
        expected: kind.tag,
      });
    }
  });

  if (!failed) result.putChange(field.name, items);
}

// ─── Relations ────────────────────────────────────────────────────────────────

function castRelationField(
  result: ValidationResult,
  field: FieldDescriptor<RelationKind>,
  raw: RawInput,
): void {
  const lookup = lookupParam(raw, field.name);

  if (!lookup.found) {
    if (field.required && field.default === undefined) missing(result, [field.name], field);
    return;
  }

  if (lookup.value === null || lookup.value === undefined) {
    result.markPresence(field.name, "null");
    if (field.required) missing(result, [field.name], field);
    return;
  }

  result.markPresence(field.name, "value");
  const { schema } = field.kind;

  if (field.kind.type === "embeds_one") {
    if (!isRawInput(lookup.value)) {
      invalidRelation(result, [field.name], lookup.value, "an object", schema);
      return;
    }
    const nested = castChangeset(schema, {}, lookup.value, schema.hook);
    result.putChange(field.name, nested);
    result.adoptErrors([field.name], nested);
    return;
  }

  const elements = toSequence(lookup.value);
  if (elements === undefined) {
    invalidRelation(result, [field.name], lookup.value, "a list of objects", schema);
    return;
  }

  const nestedResults = elements.map((element, index) => {
    const path: PathSegment[] = [field.name, index];
    if (!isRawInput(element)) {
      invalidRelation(result, path, element, "an object", schema);
      return new ValidationResult(schema).seal();
    }
    const nested = castChangeset(schema, {}, element, schema.hook);
    result.adoptErrors(path, nested);
    return nested;
  });

  result.putChange(field.name, nestedResults);
  if (field.required && nestedResults.length === 0) {
    missing(result, [field.name], field);
  }
}

/** Lists pass through; objects keyed by `"0"`, `"1"`, … are read in index order. */
function toSequence(value: unknown): readonly unknown[] | undefined {
  if (Array.isArray(value)) return value;
  if (value instanceof Map || !isPlainObject(value)) return undefined;

  const indexed: Readonly<Record<string, unknown>> = value;
  const keys = Object.keys(indexed);
  if (!keys.every((key) => INDEX_KEY.test(key))) return undefined;

  return keys
    .sort((a, b) => Number(a) - Number(b))
    .map((key) => indexed[key]);
}

// ─── Errors ───────────────────────────────────────────────────────────────────

function missing(result: ValidationResult, path: PathSegment[], field: FieldDescriptor): void {
  result.addError(path, "missing_required", BLANK_MESSAGE, {
    received: undefined,
    expected: describeKind(field.kind),
  });
}

function invalidRelation(
  result: ValidationResult,
  path: PathSegment[],
  received: unknown,
  expected: string,
  schema: Schema,
): void {
  result.addError(path, "invalid_relation", `is invalid: expected ${expected}, got ${describeRaw(received)}`, {
    received,
    expected: `${expected} (${schema.name})`,
  });
}
