import { InvalidScopeError } from "../errors.js";
import { SCOPES, type Scope } from "./types.js";

export function isScope(value: unknown): value is Scope {
  return SCOPES.some((s) => s === value);
}

/**
 * Parse a scope label as it appears in spreadsheets and forms:
 * 1, "1", "Scope 1", "scope1", "SCOPE-1".
 */
export function parseScope(value: unknown, index?: number): Scope {
  if (isScope(value)) return value;
  if (typeof value === "string") {
    const match = value.trim().match(/^(?:scope[\s_-]*)?([123])$/i);
    if (match) {
      const parsed = Number(match[1]);
      if (isScope(parsed)) return parsed;
    }
  }
  throw new InvalidScopeError(value, index ?? null);
}
