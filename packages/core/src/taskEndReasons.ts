import type { TaskEndReasonConfig, TaskStatus } from "@eventscope/contracts";
import type { TaskEndReasonRecord, TaskInfoRecord } from "./decoders/types.js";

export interface TaskEndClassification {
  status: Exclude<TaskStatus, "RUNNING">;
  endReason: string | null;
  failureReason: string | null;
  failureKind: string | null;
}

export const OTHER_FAILURE_KIND = "other";

/**
 * Maps a reported task end reason onto a terminal task status using the
 * configured table. Reasons the table does not know are FAILED with kind
 * `other`; the raw text is always kept for display.
 */
export class TaskEndClassifier {
  private readonly successReasons: Set<string>;
  private readonly killIndicators: string[];
  private readonly rules: Array<{ pattern: string; label: string }>;

  constructor(config: TaskEndReasonConfig) {
    this.successReasons = new Set(config.successReasons);
    this.killIndicators = config.killIndicators
      .map((indicator) => indicator.trim().toLowerCase())
      .filter((indicator) => indicator.length > 0);
    this.rules = config.classifications
      .map((rule) => ({ pattern: rule.pattern.trim().toLowerCase(), label: rule.label }))
      .filter((rule) => rule.pattern.length > 0);
  }

  classify(endReason: TaskEndReasonRecord | null, info: Pick<TaskInfoRecord, "failed" | "killed">): TaskEndClassification {
    if (!endReason) {
      if (info.killed) {
        return { status: "KILLED", endReason: null, failureReason: null, failureKind: this.kindOf("TaskKilled") };
      }
      if (info.failed) {
        return { status: "FAILED", endReason: null, failureReason: null, failureKind: OTHER_FAILURE_KIND };
      }
      return { status: "SUCCESS", endReason: null, failureReason: null, failureKind: null };
    }

    if (this.successReasons.has(endReason.reason)) {
      return { status: "SUCCESS", endReason: endReason.reason, failureReason: null, failureKind: null };
    }

    const failureReason = endReason.detail ? `${endReason.reason}: ${endReason.detail}` : endReason.reason;
    const haystack = failureReason.toLowerCase();
    const killed = this.killIndicators.some((indicator) => haystack.includes(indicator));
    return {
      status: killed ? "KILLED" : "FAILED",
      endReason: endReason.reason,
      failureReason,
      failureKind: this.kindOf(haystack),
    };
  }

  private kindOf(text: string): string {
    const lowered = text.toLowerCase();
    for (const rule of this.rules) {
      if (lowered.includes(rule.pattern)) return rule.label;
    }
    return OTHER_FAILURE_KIND;
  }
}
