import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type {
  AppConfig,
  DisplayConfig,
  LoadConfig,
  RedactionConfig,
  TaskEndClassificationRule,
  TaskEndReasonConfig,
} from "@eventscope/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { asArray, asRecord, isRecord } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".eventscope", "config.toml");

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonNegativeIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) return fallback;
  return Math.round(numeric);
}

function stringListOrDefault(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return [...fallback];
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function nonEmptyStringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value : fallback;
}

function mergeLoad(input: unknown): LoadConfig {
  const defaults = DEFAULT_CONFIG.load;
  const record = asRecord(input);
  return {
    maxDiagnostics: nonNegativeIntOrDefault(record.maxDiagnostics, defaults.maxDiagnostics),
    progressEveryLines: positiveIntOrDefault(record.progressEveryLines, defaults.progressEveryLines),
  };
}

function normalizeRule(value: unknown): TaskEndClassificationRule | null {
  if (!isRecord(value)) return null;
  const pattern = typeof value.pattern === "string" ? value.pattern.trim() : "";
  const label = typeof value.label === "string" ? value.label.trim() : "";
  if (!pattern || !label) return null;
  return { pattern, label };
}

function mergeTaskEndReasons(input: unknown): TaskEndReasonConfig {
  const defaults = DEFAULT_CONFIG.taskEndReasons;
  const record = asRecord(input);
  const classifications = Array.isArray(record.classifications)
    ? asArray(record.classifications)
        .map(normalizeRule)
        .filter((rule): rule is TaskEndClassificationRule => rule !== null)
    : defaults.classifications.map((rule) => ({ ...rule }));
  return {
    successReasons: stringListOrDefault(record.successReasons, defaults.successReasons),
    killIndicators: stringListOrDefault(record.killIndicators, defaults.killIndicators),
    classifications,
  };
}

function mergeDisplay(input: unknown): DisplayConfig {
  const defaults = DEFAULT_CONFIG.display;
  const record = asRecord(input);
  return {
    maxValueLength: positiveIntOrDefault(record.maxValueLength, defaults.maxValueLength),
    taskListLimit: positiveIntOrDefault(record.taskListLimit, defaults.taskListLimit),
  };
}

function mergeRedaction(input: unknown): RedactionConfig {
  const defaults = DEFAULT_CONFIG.redaction;
  const record = asRecord(input);
  return {
    enabled: typeof record.enabled === "boolean" ? record.enabled : defaults.enabled,
    pattern: nonEmptyStringOrDefault(record.pattern, defaults.pattern),
    replacement: nonEmptyStringOrDefault(record.replacement, defaults.replacement),
  };
}

/** Normalizes partial or untrusted input onto the defaults; invalid values fall back. */
export function mergeConfig(input?: unknown): AppConfig {
  const record = asRecord(input);
  return {
    load: mergeLoad(record.load),
    taskEndReasons: mergeTaskEndReasons(record.taskEndReasons),
    display: mergeDisplay(record.display),
    redaction: mergeRedaction(record.redaction),
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(configPath, "utf8");
    return mergeConfig(TOML.parse(raw));
  } catch {
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}

export function parseConfigValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  return input;
}

/**
 * Returns a copy of `config` with one dotted key replaced. Scalar values are
 * parsed from text; list keys take a comma-separated value.
 */
export function setConfigValue(config: AppConfig, dottedKey: string, rawValue: string): AppConfig {
  const parts = dottedKey.split(".").filter(Boolean);
  const [section, key] = parts;
  if (parts.length !== 2 || section === undefined || key === undefined) {
    throw new Error(`config key must look like <section>.<name>: ${dottedKey}`);
  }

  const mutable = asRecord(JSON.parse(JSON.stringify(config)));
  const target = mutable[section];
  if (!isRecord(target) || !(key in target)) {
    throw new Error(`unknown config key: ${dottedKey}`);
  }
  if (key === "classifications") {
    throw new Error(`${dottedKey} is a list of tables; edit the config file instead`);
  }

  target[key] = Array.isArray(target[key])
    ? rawValue
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
    : parseConfigValue(rawValue);
  return mergeConfig(mutable);
}
