import { asArray, asRecord, asString, isRecord, optionalInt, optionalString } from "../utils.js";

export class RecordDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecordDecodeError";
  }
}

export function requireInt(record: Record<string, unknown>, field: string, eventName: string): number {
  const value = optionalInt(record[field]);
  if (value === null) {
    throw new RecordDecodeError(`${eventName}: missing or invalid "${field}"`);
  }
  return value;
}

export function requireString(record: Record<string, unknown>, field: string, eventName: string): string {
  const value = optionalString(record[field]);
  if (value === null || !value.trim()) {
    throw new RecordDecodeError(`${eventName}: missing or invalid "${field}"`);
  }
  return value;
}

export function requireRecord(
  record: Record<string, unknown>,
  field: string,
  eventName: string,
): Record<string, unknown> {
  const value = record[field];
  if (!isRecord(value)) {
    throw new RecordDecodeError(`${eventName}: missing "${field}" object`);
  }
  return value;
}

export function stringProperties(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, nested] of Object.entries(asRecord(value))) {
    if (nested === null || nested === undefined) continue;
    out[key] = asString(nested);
  }
  return out;
}

export function propertyPairs(value: unknown): Array<readonly [string, string]> {
  if (Array.isArray(value)) {
    const pairs: Array<readonly [string, string]> = [];
    for (const entry of asArray(value)) {
      if (!Array.isArray(entry) || entry.length < 2) continue;
      const key = asString(entry[0]);
      if (!key) continue;
      pairs.push([key, asString(entry[1])] as const);
    }
    return pairs;
  }
  return Object.entries(stringProperties(value)).map(([key, nested]) => [key, nested] as const);
}

export type JsonLineParse =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; message: string };

export function parseJsonLine(line: string): JsonLineParse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    return { ok: false, message: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }
  if (!isRecord(parsed)) {
    return { ok: false, message: "line is not a JSON object" };
  }
  return { ok: true, value: parsed };
}
