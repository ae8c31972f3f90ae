import type {
  ApplicationStatus,
  ExecutorStatus,
  JobStatus,
  SqlExecutionStatus,
  StageStatus,
  TaskStatus,
} from "@eventscope/contracts";

type AnyStatus = ApplicationStatus | JobStatus | StageStatus | TaskStatus | ExecutorStatus | SqlExecutionStatus;

const STATUS_LABELS: Record<AnyStatus, string> = {
  RUNNING: "Running",
  FINISHED: "Finished",
  SUCCEEDED: "Succeeded",
  FAILED: "Failed",
  PENDING: "Pending",
  ACTIVE: "Active",
  COMPLETE: "Complete",
  SKIPPED: "Skipped",
  SUCCESS: "Success",
  KILLED: "Killed",
  REMOVED: "Removed",
  COMPLETED: "Completed",
};

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB", "PB"];

export const MISSING = "-";
export const IN_PROGRESS = "in progress";

export function statusLabel(status: AnyStatus): string {
  return STATUS_LABELS[status];
}

/** `350 ms`, `1.5 s`, `2.3 min`, `1.2 h`; `-` when unknown. */
export function formatDuration(ms: number | null): string {
  if (ms === null || !Number.isFinite(ms)) return MISSING;
  const value = Math.max(0, ms);
  if (value < 1000) return `${Math.round(value)} ms`;
  if (value < 60_000) return `${(value / 1000).toFixed(1)} s`;
  if (value < 3_600_000) return `${(value / 60_000).toFixed(1)} min`;
  return `${(value / 3_600_000).toFixed(1)} h`;
}

/** Binary units: `0 B`, `512 B`, `1.5 KB`; `-` when unknown. */
export function formatBytes(bytes: number | null): string {
  if (bytes === null || !Number.isFinite(bytes)) return MISSING;
  if (bytes <= 0) return "0 B";
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < BYTE_UNITS.length - 1) {
    size /= 1024;
    unit += 1;
  }
  if (unit === 0) return `${Math.round(bytes)} B`;
  return `${size.toFixed(1)} ${BYTE_UNITS[unit] ?? "B"}`;
}

export function formatTasks(succeeded: number, total: number | null, failed = 0, killed = 0): string {
  let label = `${succeeded}/${total ?? "?"}`;
  if (failed > 0) label += ` (${failed} failed)`;
  if (killed > 0) label += ` (${killed} killed)`;
  return label;
}

export function formatPct(pct: number | null): string {
  if (pct === null) return MISSING;
  return `${pct.toFixed(1)}%`;
}

export function formatTimestamp(ms: number | null): string {
  if (ms === null) return MISSING;
  return new Date(ms).toISOString().replace(".000Z", "Z");
}

export function sumOf(...values: Array<number | null>): number | null {
  let total: number | null = null;
  for (const value of values) {
    if (value === null) continue;
    total = (total ?? 0) + value;
  }
  return total;
}
