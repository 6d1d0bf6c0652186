export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function getObject(source: unknown, key: string): JsonObject | undefined {
  if (!isJsonObject(source)) return undefined;
  const value = source[key];
  return isJsonObject(value) ? value : undefined;
}

export function getString(source: unknown, key: string): string | undefined {
  if (!isJsonObject(source)) return undefined;
  const value = source[key];
  return typeof value === "string" ? value : undefined;
}

export function getNumber(source: unknown, key: string): number | undefined {
  if (!isJsonObject(source)) return undefined;
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function getBoolean(source: unknown, key: string): boolean | undefined {
  if (!isJsonObject(source)) return undefined;
  const value = source[key];
  return typeof value === "boolean" ? value : undefined;
}
