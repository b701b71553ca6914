export type JsonPrimitive = string | number | boolean | null;
export type JsonObject = Record<string, unknown>;
