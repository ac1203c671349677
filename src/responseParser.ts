export type JsonObject = Record<string, unknown>;

export type ParseResult =
  | { ok: true; value: JsonObject }
  | { ok: false; value: JsonObject; error: 'parse_error' };

/** Removes a surrounding ```json / ``` fence from model output. */
export function stripCodeFences(text: string): string {
  let t = text.trim();
  if (t.startsWith('```json')) t = t.slice(7);
  else if (t.startsWith('```')) t = t.slice(3);
  if (t.endsWith('```')) t = t.slice(0, -3);
  return t.trim();
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes model output expected to hold a JSON object. Never throws: anything that is
 * not an object comes back as `{}` with the parse_error marker.
 */
export function parseJsonObject(text: string): ParseResult {
  let decoded: unknown;
  try {
    decoded = JSON.parse(stripCodeFences(text));
  } catch {
    return { ok: false, value: {}, error: 'parse_error' };
  }
  if (!isJsonObject(decoded)) return { ok: false, value: {}, error: 'parse_error' };
  return { ok: true, value: decoded };
}

export function parsePlainText(text: string): string {
  return stripCodeFences(text);
}

// -- field readers ------------------------------------------------------

export function readString(obj: JsonObject, key: string, fallback = ''): string {
  const v = obj[key];
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  return fallback;
}

export function readOptionalString(obj: JsonObject, key: string): string | null {
  const v = obj[key];
  return typeof v === 'string' && v.trim() ? v.trim() : null;
}

export function readNumber(obj: JsonObject, key: string): number | null {
  const v = obj[key];
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() && Number.isFinite(Number(v))) return Number(v);
  return null;
}

export function readStringList(obj: JsonObject, key: string): string[] {
  const v = obj[key];
  if (!Array.isArray(v)) return [];
  return v.flatMap((item): string[] => {
    if (typeof item === 'string') return item.trim() ? [item] : [];
    if (isJsonObject(item) && typeof item.name === 'string') return [item.name];
    return [];
  });
}

export function readRecordList(obj: JsonObject, key: string): JsonObject[] {
  const v = obj[key];
  return Array.isArray(v) ? v.filter(isJsonObject) : [];
}

export function readBooleanMap(obj: JsonObject, key: string): Record<string, boolean> {
  const v = obj[key];
  if (!isJsonObject(v)) return {};
  const out: Record<string, boolean> = {};
  for (const [k, val] of Object.entries(v)) {
    if (typeof val === 'boolean') out[k] = val;
  }
  return out;
}
