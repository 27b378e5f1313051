import type { Schema } from "./compiler.js";
import type { FieldDescriptor } from "./field.js";
import type { Change } from "./result.js";
import { isResultList, ValidationResult } from "./result.js";
import type { CastMode, CastResult } from "./types.js";
import type { Value, ValueObject } from "./value.js";
import { cloneValue, deepMerge, fillDefaults, isObjectValue, isValue, mergeSequences } from "./value.js";

/**
 * Builds the output value of an accepted result. Layers, lowest first:
 * base (struct zero value, then pre-existing data), schema defaults, changes,
 * explicit nulls. Pure: neither the result nor the schema is modified.
 */
export function project(result: ValidationResult, mode: CastMode = "map"): CastResult<ValueObject> {
  if (!result.sealed) {
    throw new Error(`Cannot project ValidationResult for ${result.schema.name} before it is sealed`);
  }
  if (!result.valid) {
    return { ok: false, error: result };
  }
  return { ok: true, value: buildValue(result, mode) };
}

export function toMap(result: ValidationResult): CastResult<ValueObject> {
  return project(result, "map");
}

export function toStruct(result: ValidationResult): CastResult<ValueObject> {
  return project(result, "struct");
}

function buildValue(result: ValidationResult, mode: CastMode): ValueObject {
  const { schema } = result;

  let value: ValueObject = mode === "struct" ? zeroValue(schema) : {};
  value = mergeObjects(value, presentEntries(result.target));
  value = fillDefaults(value, schema.defaults);

  for (const [name, change] of result.changes) {
    const field = schema.requireField(name);
    value[name] = projectChange(field, value[name], change, mode);
  }

  for (const [name, presence] of result.presence) {
    if (presence === "null") value[name] = null;
  }

  return value;
}

function projectChange(
  field: FieldDescriptor,
  current: Value | undefined,
  change: Change,
  mode: CastMode,
): Value {
  if (change instanceof ValidationResult) {
    return deepMerge(current, buildValue(change, mode));
  }

  if (field.kind.type === "embeds_many" && isResultList(change)) {
    const items = change.map((item) => buildValue(item, mode));
    // An explicitly empty list stays empty rather than falling back to defaults
    if (items.length === 0 || !Array.isArray(current)) return items;
    return mergeSequences(current, items);
  }

  if (isValue(change)) {
    return field.kind.type === "scalar" || field.kind.type === "array"
      ? cloneValue(change)
      : deepMerge(current, change);
  }

  throw new Error(`Change for field "${field.name}" cannot be projected`);
}

/** Struct-mode starting point: every field present, defaults applied. */
export function zeroValue(schema: Schema): ValueObject {
  const value: ValueObject = {};

  for (const field of schema.fields.values()) {
    if (field.default !== undefined) {
      value[field.name] = cloneValue(field.default);
    } else if (
      field.kind.type === "embeds_one" &&
      field.kind.inline &&
      Object.keys(field.kind.schema.defaults).length > 0
    ) {
      value[field.name] = zeroValue(field.kind.schema);
    } else {
      value[field.name] = field.kind.type === "embeds_many" ? [] : null;
    }
  }

  return value;
}

function presentEntries(target: ValueObject): ValueObject {
  const entries: ValueObject = {};
  for (const [key, value] of Object.entries(target)) {
    if (value !== null) entries[key] = cloneValue(value);
  }
  return entries;
}

function mergeObjects(base: ValueObject, next: ValueObject): ValueObject {
  const merged = deepMerge(base, next);
  return isObjectValue(merged) ? merged : base;
}
