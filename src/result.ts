import type { Schema } from "./compiler.js";
import type { ErrorKind, ParamError, PathSegment } from "./types.js";
import type { Value, ValueObject } from "./value.js";

export type Change = Value | ValidationResult | readonly ValidationResult[];

/** Whether the caller supplied a key with a value, or with an explicit null. */
export type Presence = "value" | "null";

export interface ErrorDetails {
  received?: unknown;
  expected?: string | undefined;
  code?: string | undefined;
}

/**
 * The per-call record of what was cast, what changed and what failed.
 * Mutable until sealed; the engine seals it once the hook has run.
 */
export class ValidationResult {
  readonly schema: Schema;
  /** Pre-existing data the changes apply to */
  readonly target: ValueObject;

  private readonly _changes = new Map<string, Change>();
  private readonly _errors: ParamError[] = [];
  private readonly _presence = new Map<string, Presence>();
  private _sealed = false;

  constructor(schema: Schema, target: ValueObject = {}) {
    this.schema = schema;
    this.target = target;
  }

  get changes(): ReadonlyMap<string, Change> {
    return this._changes;
  }

  get errors(): readonly ParamError[] {
    return this._errors;
  }

  get valid(): boolean {
    return this._errors.length === 0;
  }

  get presence(): ReadonlyMap<string, Presence> {
    return this._presence;
  }

  get sealed(): boolean {
    return this._sealed;
  }

  getChange(name: string): Change | undefined {
    return this._changes.get(name);
  }

  /** The change for a field if there is one, otherwise its pre-existing value. */
  fetchField(name: string): Change | undefined {
    return this._changes.has(name) ? this._changes.get(name) : this.target[name];
  }

  hasError(path: PathSegment | readonly PathSegment[]): boolean {
    const key = formatPath(toPath(path));
    return this._errors.some((error) => error.key === key);
  }

  putChange(name: string, value: Change): this {
    this.assertOpen();
    this.schema.requireField(name);
    this._changes.set(name, value);
    return this;
  }

  deleteChange(name: string): this {
    this.assertOpen();
    this._changes.delete(name);
    return this;
  }

  markPresence(name: string, presence: Presence): this {
    this.assertOpen();
    this._presence.set(name, presence);
    return this;
  }

  addError(
    path: PathSegment | readonly PathSegment[],
    kind: ErrorKind,
    message: string,
    details: ErrorDetails = {},
  ): this {
    this.assertOpen();
    const segments = toPath(path);
    this._errors.push({
      path: segments,
      key: formatPath(segments),
      kind,
      message,
      received: details.received,
      expected: details.expected,
      code: details.code,
    });
    return this;
  }

  /** Copies the errors of a nested result, prefixed with the path it sits at. */
  adoptErrors(prefix: readonly PathSegment[], nested: ValidationResult): this {
    this.assertOpen();
    for (const error of nested.errors) {
      const segments = [...prefix, ...error.path];
      this._errors.push({ ...error, path: segments, key: formatPath(segments) });
    }
    return this;
  }

  seal(): this {
    this._sealed = true;
    return this;
  }

  private assertOpen(): void {
    if (this._sealed) {
      throw new Error(`ValidationResult for ${this.schema.name} is sealed and cannot be changed`);
    }
  }
}

export function isResultList(change: Change | undefined): change is readonly ValidationResult[] {
  const items: unknown = change;
  return Array.isArray(items) && items.every((item) => item instanceof ValidationResult);
}

// ─── Paths ────────────────────────────────────────────────────────────────────

function toPath(path: PathSegment | readonly PathSegment[]): readonly PathSegment[] {
  return typeof path === "string" || typeof path === "number" ? [path] : [...path];
}

/** `["near_locations", 1, "latitude"]` → `near_locations[1].latitude` */
export function formatPath(path: readonly PathSegment[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${segment}]`;
    return acc === "" ? segment : `${acc}.${segment}`;
  }, "");
}
