import type { AppConfig } from "@eventscope/contracts";

export const DEFAULT_REDACTION_PATTERN = "(?i)secret|password|token|access[.]key";
export const DEFAULT_REDACTION_REPLACEMENT = "*********(redacted)";

export const DEFAULT_CONFIG: AppConfig = {
  load: {
    maxDiagnostics: 100,
    progressEveryLines: 10_000,
  },
  taskEndReasons: {
    successReasons: ["Success"],
    killIndicators: ["TaskKilled"],
    classifications: [
      { pattern: "OutOfMemoryError", label: "out_of_memory" },
      { pattern: "FetchFailed", label: "fetch_failed" },
      { pattern: "ExecutorLostFailure", label: "executor_lost" },
      { pattern: "TaskResultLost", label: "result_lost" },
      { pattern: "TaskCommitDenied", label: "commit_denied" },
      { pattern: "TaskKilled", label: "killed" },
      { pattern: "ExceptionFailure", label: "exception" },
    ],
  },
  display: {
    maxValueLength: 200,
    taskListLimit: 200,
  },
  redaction: {
    enabled: true,
    pattern: DEFAULT_REDACTION_PATTERN,
    replacement: DEFAULT_REDACTION_REPLACEMENT,
  },
};
