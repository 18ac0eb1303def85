export type JsonValue =
  | null
  | string
  | number
  | boolean
  | JsonObject
  | JsonValue[];

export type JsonObject = { [key: string]: JsonValue | undefined };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
