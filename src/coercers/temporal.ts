import type { CoercionResult } from "../types.js";
import { BaseCoercer } from "./base.js";

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN =
  /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(Z|[+-]\d{2}:?\d{2})?$/i;

/** Calendar date, normalized to `YYYY-MM-DD`. */
export class DateCoercer extends BaseCoercer<string> {
  constructor() {
    super("date");
  }

  coerce(raw: unknown): CoercionResult<string> {
    if (typeof raw !== "string") return this.fail("a date (YYYY-MM-DD)", raw);

    const match = DATE_PATTERN.exec(raw.trim());
    if (!match) return this.fail("a date (YYYY-MM-DD)", raw);

    const [, year, month, day] = match.map(Number);
    if (year === undefined || month === undefined || day === undefined) {
      return this.fail("a date (YYYY-MM-DD)", raw);
    }

    // setUTCFullYear keeps years 0-99 as written; Date.UTC maps them to 19xx
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    if (
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day
    ) {
      return this.fail("an existing calendar date", raw);
    }

    return { ok: true, value: raw.trim() };
  }
}

/** ISO 8601 timestamp, normalized to UTC. A missing offset reads as UTC. */
export class DateTimeCoercer extends BaseCoercer<string> {
  constructor() {
    super("datetime");
  }

  coerce(raw: unknown): CoercionResult<string> {
    if (typeof raw !== "string") return this.fail("an ISO 8601 datetime", raw);

    const text = raw.trim();
    const match = DATETIME_PATTERN.exec(text);
    if (!match) return this.fail("an ISO 8601 datetime", raw);

    const parsed = new Date(match[1] === undefined ? `${text.replace(" ", "T")}Z` : text.replace(" ", "T"));
    if (Number.isNaN(parsed.getTime())) {
      return this.fail("an ISO 8601 datetime", raw);
    }

    return { ok: true, value: parsed.toISOString() };
  }
}

export function date(): DateCoercer {
  return new DateCoercer();
}

export function datetime(): DateTimeCoercer {
  return new DateTimeCoercer();
}
