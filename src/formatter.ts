import pc from "picocolors";
import type { ValidationResult } from "./result.js";
import type { ErrorKind, ParamError } from "./types.js";

const ICONS = {
  missing_required: "✖",
  type_mismatch: "⚠",
  invalid_relation: "⚠",
  user_rule: "⚠",
  success: "✔",
  error: "✖",
} as const;

const LABELS: Record<Exclude<ErrorKind, "missing_required">, string> = {
  type_mismatch: "invalid type",
  invalid_relation: "invalid relation",
  user_rule: "rejected",
};

function formatReceived(received: unknown): string {
  if (typeof received === "string") return JSON.stringify(received);
  if (received === null || typeof received !== "object") return String(received);
  try {
    return JSON.stringify(received);
  } catch {
    return Object.prototype.toString.call(received);
  }
}

function formatError(err: ParamError): string {
  const icon = ICONS[err.kind];

  if (err.kind === "missing_required") {
    return `  ${pc.red(icon)} ${pc.bold(pc.red(err.key))} ${pc.dim("→")} ${pc.red(err.message)}`;
  }

  return [
    `  ${pc.yellow(icon)} ${pc.bold(pc.yellow(err.key))} ${pc.dim("→")} ${pc.yellow(LABELS[err.kind])}`,
    err.received !== undefined
      ? `    ${pc.dim("received:")}  ${pc.white(formatReceived(err.received))}`
      : "",
    err.expected !== undefined
      ? `    ${pc.dim("expected:")}  ${pc.cyan(err.expected)}`
      : "",
    `    ${pc.dim("message:")}   ${pc.white(err.message)}`,
  ]
    .filter(Boolean)
    .join("\n");
}

export function formatErrors(errors: readonly ParamError[], source = "params"): string {
  const lines: string[] = [];

  const missing = errors.filter((e) => e.kind === "missing_required");
  const invalid = errors.filter((e) => e.kind !== "missing_required");

  lines.push("");
  lines.push(
    pc.bold(pc.red(`  ${ICONS.error} paramcast: Validation failed`)) +
      pc.dim(` (${errors.length} error${errors.length !== 1 ? "s" : ""})`),
  );
  lines.push(pc.dim(`  Source: ${source}`));
  lines.push("");

  if (missing.length > 0) {
    lines.push(pc.bold(pc.dim(`  ── Missing Fields (${missing.length}) ──────────────────`)));
    for (const err of missing) {
      lines.push(formatError(err));
    }
    lines.push("");
  }

  if (invalid.length > 0) {
    lines.push(pc.bold(pc.dim(`  ── Invalid Fields (${invalid.length}) ──────────────────`)));
    for (const err of invalid) {
      lines.push(formatError(err));
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function formatSuccess(count: number, source = "params"): string {
  return [
    "",
    `  ${pc.green(ICONS.success)} ${pc.bold(pc.green("paramcast: All fields valid"))} ${pc.dim(`(${count} checked)`)}`,
    pc.dim(`  Source: ${source}`),
    "",
  ].join("\n");
}

export class ParamsValidationError extends Error {
  readonly errors: readonly ParamError[];
  /** The rejected result, when the error came from a cast */
  readonly result: ValidationResult | undefined;

  constructor(errors: readonly ParamError[], source?: string, result?: ValidationResult) {
    super(`Params validation failed with ${errors.length} error(s)`);
    this.name = "ParamsValidationError";
    this.errors = errors;
    this.result = result;
    // Formatted report for non-TTY contexts
    this.message = formatErrors(errors, source);
  }
}
