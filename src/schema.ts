import { castChangeset } from "./caster.js";
import { compile } from "./compiler.js";
import type { Schema } from "./compiler.js";
import { describeKind } from "./field.js";
import { formatErrors, formatSuccess, ParamsValidationError } from "./formatter.js";
import { project } from "./projector.js";
import type { ValidationResult } from "./result.js";
import type {
  CastOptions,
  CastResult,
  ChangesetOptions,
  CompileOptions,
  InferMap,
  InferStruct,
  ParamError,
  RawInput,
  SchemaDescription,
} from "./types.js";
import type { Value, ValueObject } from "./value.js";

// ─── ParamsSchema ─────────────────────────────────────────────────────────────

export class ParamsSchema<D extends SchemaDescription> {
  readonly schema: Schema<D>;

  constructor(schema: Schema<D>) {
    this.schema = schema;
  }

  get name(): string {
    return this.schema.name;
  }

  /**
   * Run the structural pass and the hook, without projecting.
   * The returned result is sealed.
   */
  changeset(raw: RawInput, options: ChangesetOptions = {}): ValidationResult {
    return castChangeset(this.schema, options.data ?? {}, raw, options.hook ?? this.schema.hook);
  }

  /**
   * Cast and project raw params. Never throws for invalid input.
   */
  cast(raw: RawInput, options: CastOptions & { mode: "struct" }): CastResult<InferStruct<D>>;
  cast(raw: RawInput, options?: CastOptions): CastResult<InferMap<D>>;
  cast(raw: RawInput, options: CastOptions = {}): CastResult<unknown> {
    return project(this.changeset(raw, options), options.mode ?? "map");
  }

  /**
   * Cast and project raw params.
   * Throws `ParamsValidationError` on failure.
   */
  parse(raw: RawInput, options: CastOptions & { mode: "struct" }): InferStruct<D>;
  parse(raw: RawInput, options?: CastOptions): InferMap<D>;
  parse(raw: RawInput, options: CastOptions = {}): unknown {
    const result = project(this.changeset(raw, options), options.mode ?? "map");
    if (!result.ok) {
      throw new ParamsValidationError(result.error.errors, this.name, result.error);
    }
    return result.value;
  }

  /**
   * Validate without throwing. Returns errors array or empty array.
   */
  validate(raw: RawInput, options: ChangesetOptions = {}): readonly ParamError[] {
    return this.changeset(raw, options).errors;
  }

  /**
   * Return a plain object describing the schema, inline embeds included.
   */
  introspect(): SchemaIntrospection {
    return {
      name: this.schema.name,
      required: this.schema.required,
      optional: this.schema.optional,
      fields: introspectFields(this.schema, ""),
    };
  }
}

// ─── Introspection Types ──────────────────────────────────────────────────────

export interface IntrospectedField {
  /** Dotted path from the root schema */
  key: string;
  schema: string;
  type: string;
  required: boolean;
  default: Value | undefined;
}

export interface SchemaIntrospection {
  name: string;
  required: string[];
  optional: string[];
  fields: IntrospectedField[];
}

function introspectFields(schema: Schema, prefix: string): IntrospectedField[] {
  const fields: IntrospectedField[] = [];

  for (const field of schema.fields.values()) {
    const key = prefix ? `${prefix}.${field.name}` : field.name;
    fields.push({
      key,
      schema: schema.name,
      type: describeKind(field.kind),
      required: field.required,
      default: field.default,
    });

    if ((field.kind.type === "embeds_one" || field.kind.type === "embeds_many") && field.kind.inline) {
      fields.push(...introspectFields(field.kind.schema, key));
    }
  }

  return fields;
}

// ─── Top-level API ────────────────────────────────────────────────────────────

/**
 * Define a params schema.
 *
 * @example
 * const SearchParams = defineParams("SearchParams", {
 *   "text!": "string",
 *   near: { "latitude!": "float", "longitude!": "float" },
 *   tags: ["string"],
 * });
 *
 * const result = SearchParams.cast(req.query);
 */
export function defineParams<D extends SchemaDescription>(
  name: string,
  description: D,
  options?: CompileOptions,
): ParamsSchema<D> {
  return new ParamsSchema(compile(description, name, options));
}

/**
 * One-shot cast against a compiled schema.
 */
export function cast(
  schema: Schema,
  raw: RawInput,
  options: CastOptions = {},
): CastResult<ValueObject> {
  return project(
    castChangeset(schema, options.data ?? {}, raw, options.hook ?? schema.hook),
    options.mode ?? "map",
  );
}

/**
 * Print formatted validation errors to stderr.
 * Returns true if all valid, false if errors found.
 */
export function checkParams<D extends SchemaDescription>(
  params: ParamsSchema<D>,
  raw: RawInput,
  options: ChangesetOptions & { source?: string } = {},
): boolean {
  const errors = params.validate(raw, options);
  const source = options.source ?? params.name;

  if (errors.length > 0) {
    process.stderr.write(formatErrors(errors, source));
    return false;
  }

  process.stdout.write(formatSuccess(params.schema.fields.size, source));
  return true;
}
