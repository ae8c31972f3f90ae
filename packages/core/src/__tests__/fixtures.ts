import { SQL_EXECUTION_END, SQL_EXECUTION_START } from "../decoders/sql.js";

export const T0 = 1_700_000_000_000;

type Json = Record<string, unknown>;

function line(record: Json): string {
  return JSON.stringify(record);
}

export function logStart(version = "3.5.1"): string {
  return line({ Event: "SparkListenerLogStart", "Spark Version": version });
}

export function appStart(opts: { appId?: string; name?: string; user?: string; timestamp?: number } = {}): string {
  return line({
    Event: "SparkListenerApplicationStart",
    "App Name": opts.name ?? "etl-nightly",
    "App ID": opts.appId ?? "app-0001",
    Timestamp: opts.timestamp ?? T0,
    User: opts.user ?? "analyst",
  });
}

export function appEnd(timestamp: number): string {
  return line({ Event: "SparkListenerApplicationEnd", Timestamp: timestamp });
}

export function stageInfo(
  stageId: number,
  attemptId: number,
  opts: {
    name?: string;
    numTasks?: number;
    submissionTime?: number;
    completionTime?: number;
    failureReason?: string;
    rdds?: Json[];
  } = {},
): Json {
  const info: Json = {
    "Stage ID": stageId,
    "Stage Attempt ID": attemptId,
    "Stage Name": opts.name ?? `stage ${stageId}`,
    "Number of Tasks": opts.numTasks ?? 2,
    "Parent IDs": [],
  };
  if (opts.submissionTime !== undefined) info["Submission Time"] = opts.submissionTime;
  if (opts.completionTime !== undefined) info["Completion Time"] = opts.completionTime;
  if (opts.failureReason !== undefined) info["Failure Reason"] = opts.failureReason;
  if (opts.rdds !== undefined) info["RDD Info"] = opts.rdds;
  return info;
}

export function jobStart(
  jobId: number,
  stageIds: number[],
  opts: { submissionTime?: number; numTasks?: number; properties?: Record<string, string> } = {},
): string {
  return line({
    Event: "SparkListenerJobStart",
    "Job ID": jobId,
    "Submission Time": opts.submissionTime ?? T0 + 1_000,
    "Stage Infos": stageIds.map((stageId) =>
      stageInfo(stageId, 0, opts.numTasks === undefined ? {} : { numTasks: opts.numTasks }),
    ),
    "Stage IDs": stageIds,
    Properties: opts.properties ?? {},
  });
}

export function jobEnd(jobId: number, opts: { completionTime?: number; result?: string; message?: string } = {}): string {
  const result: Json = { Result: opts.result ?? "JobSucceeded" };
  if (opts.message !== undefined) result.Exception = { Message: opts.message };
  return line({
    Event: "SparkListenerJobEnd",
    "Job ID": jobId,
    "Completion Time": opts.completionTime ?? T0 + 9_000,
    "Job Result": result,
  });
}

export function stageSubmitted(
  stageId: number,
  attemptId: number,
  opts: { numTasks?: number; submissionTime?: number; name?: string; rdds?: Json[] } = {},
): string {
  return line({
    Event: "SparkListenerStageSubmitted",
    "Stage Info": stageInfo(stageId, attemptId, { submissionTime: T0 + 1_500, ...opts }),
    Properties: {},
  });
}

export function stageCompleted(
  stageId: number,
  attemptId: number,
  opts: { numTasks?: number; submissionTime?: number; completionTime?: number; failureReason?: string } = {},
): string {
  return line({
    Event: "SparkListenerStageCompleted",
    "Stage Info": stageInfo(stageId, attemptId, { submissionTime: T0 + 1_500, completionTime: T0 + 8_000, ...opts }),
  });
}

interface TaskOpts {
  executorId?: string;
  host?: string;
  launchTime?: number;
  finishTime?: number;
  index?: number;
  attempt?: number;
  failed?: boolean;
  killed?: boolean;
}

function taskInfo(taskId: number, opts: TaskOpts): Json {
  return {
    "Task ID": taskId,
    Index: opts.index ?? taskId,
    Attempt: opts.attempt ?? 0,
    "Launch Time": opts.launchTime ?? T0 + 2_000 + taskId,
    "Executor ID": opts.executorId ?? "1",
    Host: opts.host ?? "worker-1",
    Locality: "PROCESS_LOCAL",
    Speculative: false,
    "Finish Time": opts.finishTime ?? 0,
    Failed: opts.failed ?? false,
    Killed: opts.killed ?? false,
  };
}

export function rddInfo(rddId: number, opts: { name?: string; storageLevel?: unknown; cached?: number } = {}): Json {
  return {
    "RDD ID": rddId,
    Name: opts.name ?? `rdd ${rddId}`,
    "Number of Partitions": 4,
    "Number of Cached Partitions": opts.cached ?? 0,
    "Storage Level": opts.storageLevel ?? { "Use Disk": false, "Use Memory": false, Deserialized: false, Replication: 1 },
    "Memory Size": (opts.cached ?? 0) * 1_024,
    "Disk Size": 0,
  };
}

export function taskStart(taskId: number, stageId: number, attemptId: number, opts: TaskOpts = {}): string {
  return line({
    Event: "SparkListenerTaskStart",
    "Stage ID": stageId,
    "Stage Attempt ID": attemptId,
    "Task Info": taskInfo(taskId, opts),
  });
}

export interface MetricOpts {
  runTime?: number;
  gcTime?: number;
  memorySpilled?: number;
  diskSpilled?: number;
  bytesRead?: number;
  bytesWritten?: number;
  shuffleRemoteRead?: number;
  shuffleLocalRead?: number;
  shuffleWritten?: number;
}

export function taskMetrics(opts: MetricOpts): Json {
  const metrics: Json = {
    "Executor Run Time": opts.runTime ?? 100,
    "JVM GC Time": opts.gcTime ?? 5,
  };
  if (opts.memorySpilled !== undefined) metrics["Memory Bytes Spilled"] = opts.memorySpilled;
  if (opts.diskSpilled !== undefined) metrics["Disk Bytes Spilled"] = opts.diskSpilled;
  if (opts.bytesRead !== undefined) metrics["Input Metrics"] = { "Bytes Read": opts.bytesRead, "Records Read": 10 };
  if (opts.bytesWritten !== undefined) {
    metrics["Output Metrics"] = { "Bytes Written": opts.bytesWritten, "Records Written": 10 };
  }
  if (opts.shuffleRemoteRead !== undefined || opts.shuffleLocalRead !== undefined) {
    metrics["Shuffle Read Metrics"] = {
      "Remote Bytes Read": opts.shuffleRemoteRead ?? 0,
      "Local Bytes Read": opts.shuffleLocalRead ?? 0,
    };
  }
  if (opts.shuffleWritten !== undefined) {
    metrics["Shuffle Write Metrics"] = { "Shuffle Bytes Written": opts.shuffleWritten };
  }
  return metrics;
}

export function taskEnd(
  taskId: number,
  stageId: number,
  attemptId: number,
  opts: TaskOpts & { reason?: Json | null; metrics?: MetricOpts | null } = {},
): string {
  const record: Json = {
    Event: "SparkListenerTaskEnd",
    "Stage ID": stageId,
    "Stage Attempt ID": attemptId,
    "Task Type": "ResultTask",
    "Task Info": taskInfo(taskId, { finishTime: T0 + 3_000 + taskId, ...opts }),
  };
  if (opts.reason !== null) record["Task End Reason"] = opts.reason ?? { Reason: "Success" };
  if (opts.metrics !== null) record["Task Metrics"] = taskMetrics(opts.metrics ?? {});
  return line(record);
}

export function executorAdded(executorId: string, opts: { host?: string; cores?: number; timestamp?: number } = {}): string {
  return line({
    Event: "SparkListenerExecutorAdded",
    Timestamp: opts.timestamp ?? T0 + 500,
    "Executor ID": executorId,
    "Executor Info": { Host: opts.host ?? "worker-1", "Total Cores": opts.cores ?? 4 },
  });
}

export function executorRemoved(executorId: string, opts: { reason?: string; timestamp?: number } = {}): string {
  return line({
    Event: "SparkListenerExecutorRemoved",
    Timestamp: opts.timestamp ?? T0 + 9_500,
    "Executor ID": executorId,
    "Removed Reason": opts.reason ?? "Executor killed by driver.",
  });
}

export function blockManagerAdded(executorId: string, maxMemory: number, host = "worker-1"): string {
  return line({
    Event: "SparkListenerBlockManagerAdded",
    "Block Manager ID": { "Executor ID": executorId, Host: host, Port: 7337 },
    "Maximum Memory": maxMemory,
    Timestamp: T0 + 600,
  });
}

export function environmentUpdate(sections: Record<string, Record<string, string> | Array<[string, string]>>): string {
  return line({ Event: "SparkListenerEnvironmentUpdate", ...sections });
}

export function sqlStart(executionId: number, description: string, time = T0 + 900): string {
  return line({
    Event: SQL_EXECUTION_START,
    executionId,
    description,
    details: "details",
    physicalPlanDescription: "== Physical Plan ==",
    time,
  });
}

export function sqlEnd(executionId: number, opts: { time?: number; errorMessage?: string } = {}): string {
  const record: Json = { Event: SQL_EXECUTION_END, executionId, time: opts.time ?? T0 + 9_200 };
  if (opts.errorMessage !== undefined) record.errorMessage = opts.errorMessage;
  return line(record);
}

/** Application with one job, one stage of two tasks, all succeeding on executor "1". */
export function successfulApplication(): string[] {
  return [
    logStart(),
    appStart(),
    executorAdded("1"),
    jobStart(0, [0]),
    stageSubmitted(0, 0),
    taskStart(0, 0, 0),
    taskStart(1, 0, 0),
    taskEnd(0, 0, 0, { metrics: { runTime: 900, diskSpilled: 100, bytesRead: 2048 } }),
    taskEnd(1, 0, 0, { metrics: { runTime: 1_100, diskSpilled: 300, bytesRead: 1024 } }),
    stageCompleted(0, 0),
    jobEnd(0),
    appEnd(T0 + 10_000),
  ];
}
