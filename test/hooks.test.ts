import { describe, it, expect } from "vitest";
import { castChangeset } from "../src/caster.js";
import { compile, field } from "../src/compiler.js";
import {
  composeHooks,
  identityHook,
  validateChange,
  validateExclusion,
  validateInclusion,
  validateLength,
  validateNumber,
  validateRequired,
} from "../src/hooks.js";
import type { ValidationResult } from "../src/result.js";
import type { RawInput, ValidationHook } from "../src/types.js";
import type { ValueObject } from "../src/value.js";

const Signup = compile(
  {
    username: "string",
    age: "integer",
    tags: ["string"],
    role: field("enum", { values: ["admin", "member", "guest"] }),
    items: [{ sku: "string" }],
  },
  "Signup",
);

function run(raw: RawInput, hook: ValidationHook, data: ValueObject = {}): ValidationResult {
  return castChangeset(Signup, data, raw, hook);
}

const summary = (result: ValidationResult) =>
  result.errors.map((e) => ({ key: e.key, kind: e.kind, message: e.message, code: e.code }));

// ─── Plumbing ─────────────────────────────────────────────────────────────────

describe("identityHook", () => {
  it("returns the result untouched", () => {
    const result = run({ username: "tom" }, identityHook);
    expect(result.valid).toBe(true);
    expect(result.getChange("username")).toBe("tom");
  });
});

describe("composeHooks()", () => {
  it("runs hooks left to right", () => {
    const calls: string[] = [];
    const first: ValidationHook = (result) => {
      calls.push("first");
      return result;
    };
    const second: ValidationHook = (result) => {
      calls.push("second");
      return result;
    };

    run({}, composeHooks(first, second));
    expect(calls).toEqual(["first", "second"]);
  });

  it("passes the raw input to every hook", () => {
    const seen: RawInput[] = [];
    const record: ValidationHook = (result, raw) => {
      seen.push(raw);
      return result;
    };
    const raw = { username: "tom" };

    run(raw, composeHooks(record, record));
    expect(seen).toEqual([raw, raw]);
  });
});

// ─── validateRequired ─────────────────────────────────────────────────────────

describe("validateRequired()", () => {
  const hook: ValidationHook = (result) => validateRequired(result, ["username", "items"]);

  it("adds missing_required for blank fields", () => {
    expect(summary(run({ items: [] }, hook))).toEqual([
      { key: "username", kind: "missing_required", message: "can't be blank", code: "required" },
      { key: "items", kind: "missing_required", message: "can't be blank", code: "required" },
    ]);
  });

  it("falls back to the pre-existing data", () => {
    const result = run({ items: [{ sku: "A1" }] }, hook, { username: "existing" });
    expect(result.valid).toBe(true);
  });

  it("skips fields that already have errors", () => {
    const result = run({ username: 42, items: [{ sku: "A1" }] }, hook);
    expect(summary(result)).toEqual([
      { key: "username", kind: "type_mismatch", message: "Expected a string, got 42", code: undefined },
    ]);
  });

  it("throws on fields the schema does not declare", () => {
    const bad: ValidationHook = (result) => validateRequired(result, ["nope"]);
    expect(() => run({}, bad)).toThrowError(`Schema Signup has no field "nope"`);
  });
});

// ─── Value Rules ──────────────────────────────────────────────────────────────

describe("validateInclusion() / validateExclusion()", () => {
  it("rejects values outside the allowed set", () => {
    const hook: ValidationHook = (result) => validateInclusion(result, "role", ["member", "guest"]);
    expect(summary(run({ role: "admin" }, hook))).toEqual([
      { key: "role", kind: "user_rule", message: "is invalid", code: "inclusion" },
    ]);
    expect(run({ role: "guest" }, hook).valid).toBe(true);
  });

  it("rejects reserved values", () => {
    const hook: ValidationHook = (result) =>
      validateExclusion(result, "username", ["root", "admin"], "is reserved for staff");
    expect(summary(run({ username: "root" }, hook))).toEqual([
      { key: "username", kind: "user_rule", message: "is reserved for staff", code: "exclusion" },
    ]);
  });

  it("ignores fields without a change", () => {
    const hook: ValidationHook = (result) => validateInclusion(result, "role", ["guest"]);
    expect(run({}, hook).valid).toBe(true);
  });
});

describe("validateNumber()", () => {
  const hook: ValidationHook = (result) => validateNumber(result, "age", { min: 18, max: 120 });

  it("checks both bounds", () => {
    expect(summary(run({ age: "17" }, hook))).toEqual([
      { key: "age", kind: "user_rule", message: "must be at least 18", code: "number" },
    ]);
    expect(summary(run({ age: 121 }, hook))).toEqual([
      { key: "age", kind: "user_rule", message: "must be at most 120", code: "number" },
    ]);
    expect(run({ age: "30" }, hook).valid).toBe(true);
  });
});

describe("validateLength()", () => {
  it("counts string characters", () => {
    const hook: ValidationHook = (result) => validateLength(result, "username", { min: 3 });
    expect(summary(run({ username: "ab" }, hook))).toEqual([
      { key: "username", kind: "user_rule", message: "should have at least 3 item(s)", code: "length" },
    ]);
  });

  it("counts list items and embedded elements", () => {
    const hook: ValidationHook = (result) =>
      validateLength(validateLength(result, "tags", { max: 2 }), "items", { max: 1 });
    expect(summary(run({ tags: ["a", "b", "c"], items: [{ sku: "A" }, { sku: "B" }] }, hook))).toEqual([
      { key: "tags", kind: "user_rule", message: "should have at most 2 item(s)", code: "length" },
      { key: "items", kind: "user_rule", message: "should have at most 1 item(s)", code: "length" },
    ]);
  });
});

describe("validateChange()", () => {
  it("turns a returned message into a user_rule error", () => {
    const hook: ValidationHook = (result) =>
      validateChange(
        result,
        "username",
        (value) => (typeof value === "string" && value.includes(" ") ? "must not contain spaces" : undefined),
        "format",
      );

    expect(summary(run({ username: "tom cat" }, hook))).toEqual([
      { key: "username", kind: "user_rule", message: "must not contain spaces", code: "format" },
    ]);
    expect(run({ username: "tom" }, hook).valid).toBe(true);
  });
});

// ─── Custom Hooks ─────────────────────────────────────────────────────────────

describe("custom hooks", () => {
  it("may rewrite changes", () => {
    const lowercase: ValidationHook = (result) => {
      const username = result.getChange("username");
      return typeof username === "string" ? result.putChange("username", username.toLowerCase()) : result;
    };
    expect(run({ username: "TOM" }, lowercase).getChange("username")).toBe("tom");
  });

  it("may delete changes", () => {
    const drop: ValidationHook = (result) => result.deleteChange("tags");
    expect(run({ tags: ["a"] }, drop).changes.has("tags")).toBe(false);
  });
});
