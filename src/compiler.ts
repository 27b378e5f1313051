import { BUILTIN_COERCERS, isTypeCoercer } from "./coercers/index.js";
import type { FieldDescriptor, FieldKind } from "./field.js";
import { camelize, describeKind, parseFieldName } from "./field.js";
import type {
  BareFieldSpec,
  CoercionOptions,
  CompileOptions,
  EmbedsManySpec,
  EmbedsOneSpec,
  FieldOptionsSpec,
  SchemaDescription,
  TypeCoercer,
  ValidationHook,
} from "./types.js";
import type { Value, ValueObject } from "./value.js";
import { cloneValue, isPlainObject, isValue } from "./value.js";

// ─── Errors ───────────────────────────────────────────────────────────────────

/** A malformed schema. Raised at compile time, never while casting. */
export class SchemaDefinitionError extends Error {
  readonly schemaName: string;
  readonly field: string | undefined;

  constructor(schemaName: string, field: string | undefined, message: string) {
    super(`${field === undefined ? schemaName : `${schemaName}.${field}`}: ${message}`);
    this.name = "SchemaDefinitionError";
    this.schemaName = schemaName;
    this.field = field;
  }
}

// ─── Schema ───────────────────────────────────────────────────────────────────

interface SchemaInit<D extends SchemaDescription> {
  name: string;
  description: D;
  fields: readonly FieldDescriptor[];
  hook: ValidationHook | undefined;
}

/**
 * A compiled schema. Read-only once constructed, so one instance can serve
 * any number of casts.
 */
export class Schema<D extends SchemaDescription = SchemaDescription> {
  readonly name: string;
  readonly description: D;
  readonly fields: ReadonlyMap<string, FieldDescriptor>;
  readonly hook: ValidationHook | undefined;
  /** Field defaults by path, following inline embeds_one fields */
  readonly defaults: ValueObject;

  private readonly _inline: ReadonlyMap<string, Schema>;

  constructor(init: SchemaInit<D>) {
    this.name = init.name;
    this.description = init.description;
    this.hook = init.hook;
    this.fields = new Map(init.fields.map((field) => [field.name, field]));
    this.defaults = deepFreeze(collectDefaults(init.fields));

    const inline = new Map<string, Schema>();
    for (const field of init.fields) {
      if ((field.kind.type === "embeds_one" || field.kind.type === "embeds_many") && field.kind.inline) {
        inline.set(field.kind.schema.name, field.kind.schema);
        for (const [name, nested] of field.kind.schema.inlineSchemas) {
          inline.set(name, nested);
        }
      }
    }
    this._inline = inline;

    Object.freeze(this);
  }

  /** Every inline schema below this one, keyed by full name (`Kitten.NearLocation`). */
  get inlineSchemas(): ReadonlyMap<string, Schema> {
    return this._inline;
  }

  get required(): string[] {
    return [...this.fields.values()].filter((f) => f.required).map((f) => f.name);
  }

  get optional(): string[] {
    return [...this.fields.values()].filter((f) => !f.required).map((f) => f.name);
  }

  field(name: string): FieldDescriptor | undefined {
    return this.fields.get(name);
  }

  requireField(name: string): FieldDescriptor {
    const field = this.fields.get(name);
    if (!field) {
      throw new Error(`Schema ${this.name} has no field "${name}"`);
    }
    return field;
  }

  /** Looks up an inline schema by full name, or by a name relative to this schema. */
  resolve(name: string): Schema | undefined {
    if (name === this.name) return this;
    return this._inline.get(name) ?? this._inline.get(`${this.name}.${name}`);
  }

  /** Follows embed fields from this schema, e.g. `["bat", "wo"]`. */
  nested(path: readonly string[]): Schema | undefined {
    let current: Schema = this;
    for (const segment of path) {
      const field = current.field(segment);
      if (!field || (field.kind.type !== "embeds_one" && field.kind.type !== "embeds_many")) {
        return undefined;
      }
      current = field.kind.schema;
    }
    return current;
  }
}

// ─── Field Helpers ────────────────────────────────────────────────────────────

export interface SchemaHolder<D extends SchemaDescription> {
  readonly schema: Schema<D>;
}

export function embedsOne<D extends SchemaDescription>(
  source: Schema<D> | SchemaHolder<D>,
): EmbedsOneSpec<D> {
  return { embeds_one: source instanceof Schema ? source : source.schema };
}

export function embedsMany<D extends SchemaDescription>(
  source: Schema<D> | SchemaHolder<D>,
): EmbedsManySpec<D> {
  return { embeds_many: source instanceof Schema ? source : source.schema };
}

/**
 * Attaches options to a field: `field("string", { default: "FOO" })` is the
 * same as `[{ field: "string", default: "FOO" }]`.
 */
export function field<F extends BareFieldSpec>(
  spec: F,
  options: { readonly default?: Value; readonly [option: string]: Value | undefined } = {},
): [{ field: F; default?: Value; [option: string]: unknown }] {
  return [{ ...options, field: spec }];
}

// ─── Compilation ──────────────────────────────────────────────────────────────

interface CompileContext {
  schemaName: string;
  fieldName: string;
  coercers: Readonly<Record<string, TypeCoercer>>;
}

interface ClassifiedField {
  kind: FieldKind;
  default: Value | undefined;
  coercionOptions: CoercionOptions;
}

/**
 * Normalizes a declarative schema into field descriptors. Inline embeds are
 * compiled on the spot as `Identity.FieldName` and inherit the coercers, but
 * not the hook. Throws `SchemaDefinitionError` on malformed input.
 */
export function compile<D extends SchemaDescription>(
  description: D,
  identity: string,
  options: CompileOptions = {},
): Schema<D> {
  if (!isPlainObject(description)) {
    throw new SchemaDefinitionError(identity, undefined, "Schema description must be an object");
  }

  for (const [tag, coercer] of Object.entries(options.coercers ?? {})) {
    if (!isTypeCoercer(coercer)) {
      throw new SchemaDefinitionError(identity, undefined, `Coercer for "${tag}" has no coerce()`);
    }
  }

  const coercers: Readonly<Record<string, TypeCoercer>> = {
    ...BUILTIN_COERCERS,
    ...options.coercers,
  };
  const fields: FieldDescriptor[] = [];
  const seen = new Set<string>();

  for (const [declared, spec] of Object.entries(description)) {
    const { name, required } = parseFieldName(declared);

    if (name === "" || name.includes("!")) {
      throw new SchemaDefinitionError(identity, declared, "Invalid field name");
    }
    if (seen.has(name)) {
      throw new SchemaDefinitionError(identity, name, "Duplicate field name");
    }
    seen.add(name);

    const classified = classify(spec, { schemaName: identity, fieldName: name, coercers });
    fields.push(
      Object.freeze({
        name,
        required,
        kind: classified.kind,
        default: classified.default,
        coercionOptions: classified.coercionOptions,
      }),
    );
  }

  return new Schema<D>({ name: identity, description, fields, hook: options.hook });
}

function classify(spec: unknown, ctx: CompileContext): ClassifiedField {
  const candidate: unknown = Array.isArray(spec) && spec.length === 1 ? spec[0] : undefined;

  if (isFieldOptionsSpec(candidate)) {
    const { field: inner, default: defaultValue, ...rest } = candidate;
    const kind = classifyBare(inner, ctx);
    const coercionOptions = readCoercionOptions(rest, ctx);

    if (defaultValue !== undefined) {
      if (!isValue(defaultValue)) {
        throw new SchemaDefinitionError(ctx.schemaName, ctx.fieldName, "Default must be a JSON-compatible value");
      }
      checkDefault(kind, defaultValue, ctx);
    }
    if (kind.type === "scalar" || kind.type === "array") {
      const problem = kind.coercer.checkOptions?.(coercionOptions);
      if (problem !== undefined) throw new SchemaDefinitionError(ctx.schemaName, ctx.fieldName, problem);
    }

    return {
      kind,
      default: defaultValue === undefined ? undefined : deepFreeze(cloneValue(defaultValue)),
      coercionOptions,
    };
  }

  const kind = classifyBare(spec, ctx);
  if (kind.type === "scalar" || kind.type === "array") {
    const problem = kind.coercer.checkOptions?.({});
    if (problem !== undefined) throw new SchemaDefinitionError(ctx.schemaName, ctx.fieldName, problem);
  }
  return { kind, default: undefined, coercionOptions: {} };
}

function classifyBare(spec: unknown, ctx: CompileContext): FieldKind {
  if (typeof spec === "string") {
    return { type: "scalar", tag: spec, coercer: lookupCoercer(spec, ctx) };
  }

  if (isEmbedSpec(spec)) {
    if ("embeds_one" in spec) {
      return { type: "embeds_one", schema: resolveRef(spec.embeds_one, ctx), inline: false };
    }
    return { type: "embeds_many", schema: resolveRef(spec.embeds_many, ctx), inline: false };
  }

  if (Array.isArray(spec)) {
    const [element, ...extra] = spec;
    if (extra.length > 0 || element === undefined) {
      throw new SchemaDefinitionError(
        ctx.schemaName,
        ctx.fieldName,
        "Array fields take exactly one element type",
      );
    }
    if (typeof element === "string") {
      return { type: "array", tag: element, coercer: lookupCoercer(element, ctx) };
    }
    if (isSchemaDescription(element)) {
      return { type: "embeds_many", schema: compileInline(element, ctx), inline: true };
    }
  } else if (isSchemaDescription(spec)) {
    return { type: "embeds_one", schema: compileInline(spec, ctx), inline: true };
  }

  throw new SchemaDefinitionError(ctx.schemaName, ctx.fieldName, "Unrecognized field spec");
}

function compileInline(description: SchemaDescription, ctx: CompileContext): Schema {
  return compile(description, `${ctx.schemaName}.${camelize(ctx.fieldName)}`, {
    coercers: ctx.coercers,
  });
}

function lookupCoercer(tag: string, ctx: CompileContext): TypeCoercer {
  const coercer = Object.hasOwn(ctx.coercers, tag) ? ctx.coercers[tag] : undefined;
  if (!coercer) {
    throw new SchemaDefinitionError(ctx.schemaName, ctx.fieldName, `Unknown type "${tag}"`);
  }
  return coercer;
}

function resolveRef(ref: unknown, ctx: CompileContext): Schema {
  if (ref instanceof Schema) return ref;
  if (typeof ref === "object" && ref !== null && "schema" in ref && ref.schema instanceof Schema) {
    return ref.schema;
  }
  throw new SchemaDefinitionError(ctx.schemaName, ctx.fieldName, "Embed references an undefined schema");
}

function readCoercionOptions(rest: Record<string, unknown>, ctx: CompileContext): CoercionOptions {
  const options: Record<string, Value> = {};
  for (const [key, value] of Object.entries(rest)) {
    if (!isValue(value)) {
      throw new SchemaDefinitionError(
        ctx.schemaName,
        ctx.fieldName,
        `Option "${key}" must be a JSON-compatible value`,
      );
    }
    options[key] = value;
  }
  return Object.freeze(options);
}

function checkDefault(kind: FieldKind, value: Value, ctx: CompileContext): void {
  let ok: boolean;
  switch (kind.type) {
    case "scalar":
      ok = kind.tag === "any" || kind.tag === "map" || !(typeof value === "object" && value !== null);
      break;
    case "array":
      ok = value === null || Array.isArray(value);
      break;
    case "embeds_one":
      ok = value === null || isPlainObject(value);
      break;
    case "embeds_many":
      ok = value === null || (Array.isArray(value) && value.every((item) => isPlainObject(item)));
      break;
  }

  if (!ok) {
    throw new SchemaDefinitionError(
      ctx.schemaName,
      ctx.fieldName,
      `Default does not match field type ${describeKind(kind)}`,
    );
  }
}

function collectDefaults(fields: readonly FieldDescriptor[]): ValueObject {
  const defaults: ValueObject = {};
  for (const field of fields) {
    if (field.default !== undefined) {
      defaults[field.name] = field.default;
    } else if (field.kind.type === "embeds_one" && field.kind.inline) {
      const nested = field.kind.schema.defaults;
      if (Object.keys(nested).length > 0) defaults[field.name] = nested;
    }
  }
  return defaults;
}

// ─── Guards ───────────────────────────────────────────────────────────────────

function isEmbedSpec(
  value: unknown,
): value is { readonly embeds_one: unknown } | { readonly embeds_many: unknown } {
  if (!isPlainObject(value)) return false;
  const keys = Object.keys(value);
  return keys.length === 1 && (keys[0] === "embeds_one" || keys[0] === "embeds_many");
}

function isSchemaDescription(value: unknown): value is SchemaDescription {
  return isPlainObject(value) && !isEmbedSpec(value);
}

/**
 * The options form wins over an inline embeds_many whenever the object has
 * a `field` key holding something that reads as a field spec.
 */
function isFieldOptionsSpec(value: unknown): value is FieldOptionsSpec {
  if (!isPlainObject(value) || !("field" in value)) return false;
  const inner = value["field"];
  if (typeof inner === "string" || isPlainObject(inner)) return true;
  return Array.isArray(inner) && inner.length === 1 && (typeof inner[0] === "string" || isPlainObject(inner[0]));
}

function deepFreeze<V extends Value>(value: V): V {
  if (typeof value === "object" && value !== null) {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}
