/**
 * Checked access into loosely shaped API payloads
 *
 * Every accessor is total: a missing or mistyped field yields undefined (or the
 * given default) instead of throwing.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Maximum length of any diagnostic body carried in a result */
export const MAX_DETAIL_LENGTH = 2000;

export function truncate(text: string, max: number = MAX_DETAIL_LENGTH): string {
  return text.length > max ? text.slice(0, max) : text;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON text without throwing
 */
export function parseJson(
  text: string,
): { ok: true; value: JsonValue } | { ok: false; error: string } {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

export function asObject(value: JsonValue | undefined): JsonObject | undefined {
  return isJsonObject(value) ? value : undefined;
}

export function asArray(value: JsonValue | undefined): JsonValue[] | undefined {
  return Array.isArray(value) ? value : undefined;
}

export function asString(value: JsonValue | undefined, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

export function asNumber(value: JsonValue | undefined, fallback = 0): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * Follow a path of object keys and array indices.
 *
 * getPath(chunk, ['choices', 0, 'delta', 'content'])
 */
export function getPath(
  value: JsonValue | undefined,
  path: ReadonlyArray<string | number>,
): JsonValue | undefined {
  let current = value;
  for (const segment of path) {
    if (typeof segment === 'number') {
      const arr = asArray(current);
      if (!arr || segment < 0 || segment >= arr.length) return undefined;
      current = arr[segment];
    } else {
      const obj = asObject(current);
      if (!obj || !Object.hasOwn(obj, segment)) return undefined;
      current = obj[segment];
    }
  }
  return current;
}

/**
 * Mirrors loose truthiness: "", 0, false, null, [] and {} count as empty.
 */
export function isEmptyJson(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null || value === false) return true;
  if (value === '' || value === 0) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isJsonObject(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Describe the JSON type of a value for diagnostics
 */
export function jsonTypeName(value: JsonValue | undefined): string {
  if (value === undefined) return 'missing';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
