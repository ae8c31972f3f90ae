import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { DiscoveredEventLog } from "@eventscope/contracts";
import { EventLogSourceError, errorMessage } from "./errors.js";
import { expandHome } from "./utils.js";

export const IN_PROGRESS_SUFFIX = ".inprogress";
export const ROLLING_DIR_PREFIX = "eventlog_v2_";
export const COMPRESSED_EXTENSIONS = [".lz4", ".lzf", ".snappy", ".zstd"];

const ROLLING_PART_PATTERN = /^events_(\d+)_/;

export interface EventLogSource {
  path: string;
  kind: "file" | "rolling";
  /** Files to read, in order. */
  parts: string[];
  inProgress: boolean;
}

function stripInProgress(name: string): string {
  return name.endsWith(IN_PROGRESS_SUFFIX) ? name.slice(0, -IN_PROGRESS_SUFFIX.length) : name;
}

function compressionOf(name: string): string | null {
  const ext = path.extname(stripInProgress(name)).toLowerCase();
  return COMPRESSED_EXTENSIONS.includes(ext) ? ext : null;
}

function rollingPartIndex(name: string): number | null {
  const match = ROLLING_PART_PATTERN.exec(name);
  if (!match?.[1]) return null;
  return Number(match[1]);
}

async function resolveRollingDirectory(dirPath: string): Promise<EventLogSource> {
  const names = await fg(["events_*", "appstatus_*"], {
    cwd: dirPath,
    onlyFiles: true,
    deep: 1,
    dot: false,
    suppressErrors: true,
  });

  const parts: Array<{ index: number; name: string }> = [];
  let inProgress = false;
  for (const name of names) {
    if (name.startsWith("appstatus_")) {
      inProgress = inProgress || name.endsWith(IN_PROGRESS_SUFFIX);
      continue;
    }
    const index = rollingPartIndex(name);
    if (index === null) continue;
    const codec = compressionOf(name);
    if (codec) {
      throw new EventLogSourceError(dirPath, `compressed event log part ${name} (${codec}) is not supported`);
    }
    parts.push({ index, name });
  }

  if (parts.length === 0) {
    throw new EventLogSourceError(dirPath, "no events_<n>_<appId> parts found in rolling event log directory");
  }
  parts.sort((a, b) => a.index - b.index || a.name.localeCompare(b.name));
  return {
    path: dirPath,
    kind: "rolling",
    parts: parts.map((part) => path.join(dirPath, part.name)),
    inProgress,
  };
}

/**
 * Resolves a user-supplied path to the files that make up one event log:
 * a single file or a rolling `eventlog_v2_*` directory.
 */
export async function resolveEventLogSource(inputPath: string): Promise<EventLogSource> {
  const resolved = path.resolve(expandHome(inputPath));
  let info: Stats;
  try {
    info = await stat(resolved);
  } catch (error) {
    throw new EventLogSourceError(resolved, `cannot open event log: ${errorMessage(error)}`);
  }

  if (info.isDirectory()) {
    return resolveRollingDirectory(resolved);
  }
  if (!info.isFile()) {
    throw new EventLogSourceError(resolved, "not a regular file or directory");
  }

  const name = path.basename(resolved);
  const codec = compressionOf(name);
  if (codec) {
    throw new EventLogSourceError(resolved, `compressed event logs (${codec}) are not supported`);
  }
  return {
    path: resolved,
    kind: "file",
    parts: [resolved],
    inProgress: name.endsWith(IN_PROGRESS_SUFFIX),
  };
}

function logIdOf(name: string, kind: DiscoveredEventLog["kind"]): string {
  const base = stripInProgress(name);
  return kind === "rolling" && base.startsWith(ROLLING_DIR_PREFIX) ? base.slice(ROLLING_DIR_PREFIX.length) : base;
}

async function describe(source: EventLogSource): Promise<DiscoveredEventLog> {
  let sizeBytes = 0;
  let mtimeMs = 0;
  for (const part of source.parts) {
    const info = await stat(part);
    sizeBytes += info.size;
    mtimeMs = Math.max(mtimeMs, info.mtimeMs);
  }
  return {
    id: logIdOf(path.basename(source.path), source.kind),
    path: source.path,
    kind: source.kind,
    parts: source.parts,
    inProgress: source.inProgress,
    sizeBytes,
    mtimeMs,
  };
}

/** Lists the loadable event logs directly under `root`, newest first. */
export async function discoverEventLogs(root: string): Promise<DiscoveredEventLog[]> {
  const resolvedRoot = path.resolve(expandHome(root));
  try {
    const info = await stat(resolvedRoot);
    if (!info.isDirectory()) {
      throw new EventLogSourceError(resolvedRoot, "not a directory");
    }
  } catch (error) {
    if (error instanceof EventLogSourceError) throw error;
    throw new EventLogSourceError(resolvedRoot, `cannot list event logs: ${errorMessage(error)}`);
  }

  const files = await fg(["*"], {
    cwd: resolvedRoot,
    absolute: true,
    onlyFiles: true,
    deep: 1,
    dot: false,
    suppressErrors: true,
    ignore: ["*.crc"],
  });
  const rollingDirs = await fg([`${ROLLING_DIR_PREFIX}*`], {
    cwd: resolvedRoot,
    absolute: true,
    onlyDirectories: true,
    deep: 1,
    dot: false,
    suppressErrors: true,
  });

  const found: DiscoveredEventLog[] = [];
  for (const candidate of [...files, ...rollingDirs]) {
    if (!rollingDirs.includes(candidate) && compressionOf(path.basename(candidate))) continue;
    try {
      found.push(await describe(await resolveEventLogSource(candidate)));
    } catch (error) {
      if (!(error instanceof EventLogSourceError)) throw error;
      // unreadable or compressed rolling logs are not listed
    }
  }

  found.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));
  return found;
}
