import type { CoercionOptions, CoercionResult } from "../types.js";
import { BaseCoercer, readStringList } from "./base.js";

const DEFAULT_PROTOCOLS = ["http", "https"];

export class UrlCoercer extends BaseCoercer<string> {
  constructor() {
    super("url");
  }

  coerce(raw: unknown, options: CoercionOptions): CoercionResult<string> {
    if (typeof raw !== "string") {
      return this.fail("a valid URL", raw);
    }

    let parsed: URL;

    try {
      parsed = new URL(raw);
    } catch {
      return this.fail("a valid URL", raw);
    }

    const protocols = readStringList(options, "protocols") ?? DEFAULT_PROTOCOLS;
    const protocol = parsed.protocol.replace(":", "");
    if (!protocols.includes(protocol)) {
      return {
        ok: false,
        error: `URL protocol must be one of [${protocols.join(", ")}], got "${protocol}"`,
      };
    }

    if (/\/{2,}/.test(parsed.pathname)) {
      return {
        ok: false,
        error: `URL path must not contain consecutive slashes, got "${raw}"`,
      };
    }

    return { ok: true, value: raw };
  }

  checkOptions(options: CoercionOptions): string | undefined {
    if (options["protocols"] !== undefined && !readStringList(options, "protocols")) {
      return `Option "protocols" must be a list of strings`;
    }
    return undefined;
  }
}

export function url(): UrlCoercer {
  return new UrlCoercer();
}
