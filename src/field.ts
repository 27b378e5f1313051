import type { Schema } from "./compiler.js";
import type { CoercionOptions, TypeCoercer } from "./types.js";
import type { Value } from "./value.js";

// ─── Field Descriptor ─────────────────────────────────────────────────────────

export type FieldKind =
  | { readonly type: "scalar"; readonly tag: string; readonly coercer: TypeCoercer }
  | { readonly type: "array"; readonly tag: string; readonly coercer: TypeCoercer }
  | { readonly type: "embeds_one"; readonly schema: Schema; readonly inline: boolean }
  | { readonly type: "embeds_many"; readonly schema: Schema; readonly inline: boolean };

export type ScalarKind = Extract<FieldKind, { type: "scalar" | "array" }>;
export type RelationKind = Extract<FieldKind, { type: "embeds_one" | "embeds_many" }>;

export interface FieldDescriptor<K extends FieldKind = FieldKind> {
  readonly name: string;
  readonly required: boolean;
  readonly kind: K;
  readonly default: Value | undefined;
  readonly coercionOptions: CoercionOptions;
}

export function isRelation(field: FieldDescriptor): field is FieldDescriptor<RelationKind> {
  return field.kind.type === "embeds_one" || field.kind.type === "embeds_many";
}

export function isScalar(field: FieldDescriptor): field is FieldDescriptor<ScalarKind> {
  return !isRelation(field);
}

/** Human-readable type, used in error reports and introspection. */
export function describeKind(kind: FieldKind): string {
  switch (kind.type) {
    case "scalar":
      return kind.tag;
    case "array":
      return `[${kind.tag}]`;
    case "embeds_one":
      return `embeds_one(${kind.schema.name})`;
    case "embeds_many":
      return `embeds_many(${kind.schema.name})`;
  }
}

// ─── Names ────────────────────────────────────────────────────────────────────

const REQUIRED_MARKER = "!";

export function parseFieldName(declared: string): { name: string; required: boolean } {
  if (declared.endsWith(REQUIRED_MARKER)) {
    return { name: declared.slice(0, -REQUIRED_MARKER.length), required: true };
  }
  return { name: declared, required: false };
}

/** `near_location` → `NearLocation` */
export function camelize(name: string): string {
  return name
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}
