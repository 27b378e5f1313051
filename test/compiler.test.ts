import { describe, it, expect } from "vitest";
import { compile, embedsMany, embedsOne, field, Schema, SchemaDefinitionError } from "../src/compiler.js";
import { CustomCoercer } from "../src/coercers/base.js";
import { describeKind } from "../src/field.js";
import type { ValidationHook } from "../src/types.js";

const kindOf = (schema: Schema, name: string): string => describeKind(schema.requireField(name).kind);

// ─── Classification ───────────────────────────────────────────────────────────

describe("compile()", () => {
  it("classifies every field form", () => {
    const location = compile({ "latitude!": "float", "longitude!": "float" }, "Location");
    const schema = compile(
      {
        "name!": "string",
        tags: ["string"],
        owner: { "email!": "email" },
        visits: [{ at: "datetime" }],
        home: embedsOne(location),
        stops: embedsMany(location),
        count: field("integer", { default: 1 }),
      },
      "Kitten",
    );

    expect(kindOf(schema, "name")).toBe("string");
    expect(kindOf(schema, "tags")).toBe("[string]");
    expect(kindOf(schema, "owner")).toBe("embeds_one(Kitten.Owner)");
    expect(kindOf(schema, "visits")).toBe("embeds_many(Kitten.Visits)");
    expect(kindOf(schema, "home")).toBe("embeds_one(Location)");
    expect(kindOf(schema, "stops")).toBe("embeds_many(Location)");
    expect(kindOf(schema, "count")).toBe("integer");
  });

  it("splits the required marker off field names", () => {
    const schema = compile({ "name!": "string", age: "integer" }, "Person");

    expect(schema.required).toEqual(["name"]);
    expect(schema.optional).toEqual(["age"]);
    expect(schema.field("name!")).toBeUndefined();
  });

  it("reads the one-element options form", () => {
    const schema = compile({ c: [{ field: "string", default: "C" }] }, "Defaults");
    const c = schema.requireField("c");

    expect(describeKind(c.kind)).toBe("string");
    expect(c.default).toBe("C");
    expect(c.coercionOptions).toEqual({});
  });

  it("keeps coercion options apart from the default", () => {
    const schema = compile({ price: field("decimal", { scale: 2, default: 0 }) }, "Item");
    const price = schema.requireField("price");

    expect(price.coercionOptions).toEqual({ scale: 2 });
    expect(price.default).toBe(0);
  });

  it("reuses referenced schemas without recompiling them", () => {
    const location = compile({ "latitude!": "float" }, "Location");
    const schema = compile({ home: embedsOne(location) }, "Kitten");
    const home = schema.requireField("home");

    expect(home.kind.type === "embeds_one" && home.kind.schema).toBe(location);
  });

  it("accepts a holder with a schema property as reference", () => {
    const location = compile({ "latitude!": "float" }, "Location");
    const schema = compile({ home: embedsOne({ schema: location }) }, "Kitten");

    expect(schema.nested(["home"])).toBe(location);
  });

  it("freezes the compiled schema", () => {
    const schema = compile({ name: "string" }, "Frozen");

    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.requireField("name"))).toBe(true);
  });
});

// ─── Inline Schemas ───────────────────────────────────────────────────────────

describe("inline schemas", () => {
  const schema = compile(
    {
      "name!": "string",
      near_location: { "latitude!": "float", address: { street: "string" } },
      visits: [{ at: "datetime" }],
    },
    "Kitten",
  );

  it("names inline embeds after their parent and camelized field", () => {
    expect(schema.nested(["near_location"])?.name).toBe("Kitten.NearLocation");
    expect(schema.nested(["near_location", "address"])?.name).toBe("Kitten.NearLocation.Address");
    expect(schema.nested(["visits"])?.name).toBe("Kitten.Visits");
  });

  it("registers every inline schema recursively", () => {
    expect([...schema.inlineSchemas.keys()].sort()).toEqual([
      "Kitten.NearLocation",
      "Kitten.NearLocation.Address",
      "Kitten.Visits",
    ]);
  });

  it("resolves full and relative names", () => {
    expect(schema.resolve("Kitten.NearLocation")).toBe(schema.nested(["near_location"]));
    expect(schema.resolve("NearLocation.Address")).toBe(schema.nested(["near_location", "address"]));
    expect(schema.resolve("Kitten")).toBe(schema);
    expect(schema.resolve("Missing")).toBeUndefined();
  });

  it("returns undefined when a path goes through a scalar", () => {
    expect(schema.nested(["name"])).toBeUndefined();
  });
});

// ─── Defaults ─────────────────────────────────────────────────────────────────

describe("schema defaults", () => {
  it("collects defaults along inline embeds_one paths", () => {
    const schema = compile(
      {
        a: "string",
        c: [{ field: "string", default: "C" }],
        d: { e: "string", g: [{ field: "string", default: "G" }] },
        l: { m: "string" },
        n: { o: { p: [{ field: "string", default: "P" }] } },
        q: [{ r: [{ field: "string", default: "R" }] }],
      },
      "DefaultNested",
    );

    expect(schema.defaults).toEqual({ c: "C", d: { g: "G" }, n: { o: { p: "P" } } });
  });

  it("does not freeze the caller's default objects", () => {
    const fallback = { lang: "en" };
    compile({ prefs: field("map", { default: fallback }) }, "Prefs");

    expect(Object.isFrozen(fallback)).toBe(false);
  });
});

// ─── Options ──────────────────────────────────────────────────────────────────

describe("compile options", () => {
  it("keeps the hook on the root schema only", () => {
    const hook: ValidationHook = (result) => result;
    const schema = compile({ inner: { x: "string" } }, "Hooked", { hook });

    expect(schema.hook).toBe(hook);
    expect(schema.nested(["inner"])?.hook).toBeUndefined();
  });

  it("lets inline embeds use custom coercers", () => {
    const slug = new CustomCoercer<string>((raw) =>
      typeof raw === "string" ? { ok: true, value: raw } : { ok: false, error: "not a slug" },
    );
    const schema = compile({ post: { "slug!": "slug" } }, "Blog", { coercers: { slug } });

    expect(schema.nested(["post"])?.requireField("slug").kind).toEqual({
      type: "scalar",
      tag: "slug",
      coercer: slug,
    });
  });
});

// ─── Errors ───────────────────────────────────────────────────────────────────

describe("SchemaDefinitionError", () => {
  it("rejects duplicate names", () => {
    expect(() => compile({ name: "string", "name!": "string" }, "Dup")).toThrowError(
      new SchemaDefinitionError("Dup", "name", "Duplicate field name"),
    );
  });

  it("rejects empty names", () => {
    expect(() => compile({ "!": "string" }, "Empty")).toThrowError("Empty.!: Invalid field name");
  });

  it("rejects unknown type tags", () => {
    expect(() => compile({ when: "timestamp" }, "Unknown")).toThrowError(
      `Unknown.when: Unknown type "timestamp"`,
    );
  });

  it("rejects unknown element types", () => {
    expect(() => compile({ tags: ["strng"] }, "Tags")).toThrowError(`Tags.tags: Unknown type "strng"`);
  });

  it("rejects unresolved embed references", () => {
    expect(() => compile({ home: { embeds_one: "Location" } }, "Kitten")).toThrowError(
      "Kitten.home: Embed references an undefined schema",
    );
  });

  it("rejects coercion options the coercer refuses", () => {
    expect(() => compile({ count: field("integer", { scale: 2 }) }, "Opts")).toThrowError(
      `Opts.count: Option "scale" only applies to decimal fields`,
    );
  });

  it("requires values for enum fields", () => {
    expect(() => compile({ sort: "enum" }, "Sort")).toThrowError(
      `Sort.sort: Option "values" is required for enum fields`,
    );
    expect(() => compile({ sort: field("enum", { values: ["asc", "desc"] }) }, "Sort")).not.toThrow();
  });

  it("rejects defaults that do not fit the field", () => {
    expect(() => compile({ tags: field(["string"], { default: "x" }) }, "Bad")).toThrowError(
      "Bad.tags: Default does not match field type [string]",
    );
  });

  it("names the inline schema in nested errors", () => {
    expect(() => compile({ owner: { age: "years" } }, "Kitten")).toThrowError(
      `Kitten.Owner.age: Unknown type "years"`,
    );
  });

  it("is a SchemaDefinitionError with schema and field", () => {
    try {
      compile({ when: "timestamp" }, "Unknown");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaDefinitionError);
      if (err instanceof SchemaDefinitionError) {
        expect(err.schemaName).toBe("Unknown");
        expect(err.field).toBe("when");
      }
    }
  });
});
