import type { PropertyPair, RedactionConfig } from "@eventscope/contracts";

const FALLBACK_PATTERN = /secret|password|token|access[.]key/i;

export function compilePattern(pattern: string, fallback: RegExp = FALLBACK_PATTERN): RegExp {
  const trimmed = pattern.trim();
  if (!trimmed) return fallback;

  let source = trimmed;
  let flags = "";
  if (source.startsWith("(?i)")) {
    source = source.slice(4);
    flags = "i";
  }

  try {
    return new RegExp(source, flags);
  } catch {
    return fallback;
  }
}

export type Redactor = (key: string, value: string) => string;

/** A pair is redacted when either its key or its value matches the pattern. */
export function createRedactor(config: RedactionConfig): Redactor {
  if (!config.enabled) {
    return (_key, value) => value;
  }
  const pattern = compilePattern(config.pattern);
  return (key, value) => (pattern.test(key) || pattern.test(value) ? config.replacement : value);
}

export function redactPairs(pairs: readonly PropertyPair[], config: RedactionConfig): PropertyPair[] {
  const redact = createRedactor(config);
  return pairs.map(([key, value]) => [key, redact(key, value)] as const);
}
