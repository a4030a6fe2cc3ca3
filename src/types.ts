/**
 * Shared types used across the analysis stages.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Free-form attribute map attached to graph nodes, edges and IR metadata.
 * Values are restricted to JSON so every structure persists verbatim.
 */
export type Attributes = Record<string, JsonValue>;

export type Severity = 'high' | 'medium' | 'low';

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return isRecord(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAttributes(value: unknown): value is Attributes {
  return isRecord(value) && Object.values(value).every(isJsonValue);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
