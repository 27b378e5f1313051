/**
 * Basic usage example for paramcast
 *
 * Run: npx tsx examples/basic.ts
 */
import {
  defineParams,
  embedsMany,
  field,
  composeHooks,
  validateLength,
  validateNumber,
  ParamsValidationError,
} from "../src/index.js";

// ─── Define your schemas ──────────────────────────────────────────────────────

const Location = defineParams("Location", {
  "latitude!": "float",
  "longitude!": "float",
});

const SearchParams = defineParams(
  "SearchParams",
  {
    "text!": "string",
    sort: field("enum", { values: ["relevance", "distance"], default: "relevance" }),
    page: field("integer", { default: 1 }),
    radius: field("decimal", { scale: 2 }),
    tags: ["string"],
    near: embedsMany(Location),
    filters: {
      open_now: field("boolean", { default: false }),
      price: { max: "integer" },
    },
  },
  {
    hook: composeHooks(
      (result) => validateLength(result, "text", { min: 2 }),
      (result) => validateNumber(result, "page", { min: 1 }),
    ),
  },
);

// ─── Cast a query string ──────────────────────────────────────────────────────

// Simulates a decoded request query
const query = {
  text: "coffee",
  radius: "2.456",
  tags: ["wifi", "quiet"],
  near: { "0": { latitude: "52.52", longitude: "13.40" } },
  filters: { price: { max: "3" } },
};

const result = SearchParams.cast(query, { mode: "struct" });

if (result.ok) {
  // ─── Full TypeScript inference ──────────────────────────────────────────────
  // result.value.text          → string | null
  // result.value.page          → number | null
  // result.value.near          → { latitude: number | null; longitude: number | null }[]
  // result.value.filters       → { open_now: boolean | null; price: ... } | null
  console.log("✓ Params cast:");
  console.log(`  text: ${result.value.text}`);
  console.log(`  sort: ${result.value.sort}`);
  console.log(`  page: ${result.value.page}`);
  console.log(`  radius: ${result.value.radius}`);
  console.log(`  near: ${JSON.stringify(result.value.near)}`);
  console.log(`  filters: ${JSON.stringify(result.value.filters)}`);
}

// ─── Parse: throws ParamsValidationError if invalid ─────────────────────────

try {
  SearchParams.parse({ text: "x", page: "0", near: [{ latitude: "north" }] });
} catch (err) {
  if (!(err instanceof ParamsValidationError)) throw err;
  console.log(err.message);
}

// ─── Introspect ───────────────────────────────────────────────────────────────

for (const f of SearchParams.introspect().fields) {
  console.log(`${f.required ? "*" : " "} ${f.key.padEnd(22)} ${f.type}`);
}
