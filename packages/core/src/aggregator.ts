import { TASK_METRIC_NAMES } from "@eventscope/contracts";
import type {
  ApplicationAggregate,
  DurationStats,
  ExecutorAggregate,
  ExecutorStatus,
  JobAggregate,
  JobStatus,
  MetricSummaries,
  MetricSummary,
  StageAggregate,
  StageKey,
  StageStatus,
  StageStatusCounts,
  Task,
  TaskStatusCounts,
} from "@eventscope/contracts";
import type { EntityStore } from "./store.js";

const PROGRESS_STATUSES: ReadonlySet<StageStatus> = new Set<StageStatus>(["ACTIVE", "COMPLETE"]);

export function emptyTaskCounts(): TaskStatusCounts {
  return { RUNNING: 0, SUCCESS: 0, FAILED: 0, KILLED: 0 };
}

export function emptyStageCounts(): StageStatusCounts {
  return { PENDING: 0, ACTIVE: 0, COMPLETE: 0, FAILED: 0, SKIPPED: 0 };
}

function emptySummary(): MetricSummary {
  return { sum: null, max: null };
}

export function emptyMetricSummaries(): MetricSummaries {
  return {
    executorRunTime: emptySummary(),
    executorCpuTime: emptySummary(),
    executorDeserializeTime: emptySummary(),
    resultSize: emptySummary(),
    jvmGcTime: emptySummary(),
    resultSerializationTime: emptySummary(),
    memoryBytesSpilled: emptySummary(),
    diskBytesSpilled: emptySummary(),
    peakExecutionMemory: emptySummary(),
    shuffleRemoteBytesRead: emptySummary(),
    shuffleLocalBytesRead: emptySummary(),
    shuffleFetchWaitTime: emptySummary(),
    shuffleRecordsRead: emptySummary(),
    shuffleBytesWritten: emptySummary(),
    shuffleWriteTime: emptySummary(),
    shuffleRecordsWritten: emptySummary(),
    inputBytesRead: emptySummary(),
    inputRecordsRead: emptySummary(),
    outputBytesWritten: emptySummary(),
    outputRecordsWritten: emptySummary(),
  };
}

/** Wall-clock duration of a task, or null until both ends are known. */
export function taskDurationMs(task: Pick<Task, "launchTime" | "finishTime">): number | null {
  if (task.launchTime === null || task.finishTime === null) return null;
  return Math.max(0, task.finishTime - task.launchTime);
}

export function spanMs(start: number | null, end: number | null): number | null {
  if (start === null || end === null) return null;
  return Math.max(0, end - start);
}

function countTasks(tasks: ReadonlyArray<Readonly<Task>>): TaskStatusCounts {
  const counts = emptyTaskCounts();
  for (const task of tasks) counts[task.status] += 1;
  return counts;
}

export function durationStats(values: number[]): DurationStats {
  if (values.length === 0) return { min: null, median: null, max: null };
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;
  const median = sorted.length % 2 === 0 ? ((sorted[middle - 1] ?? upper) + upper) / 2 : upper;
  return {
    min: sorted[0] ?? null,
    median,
    max: sorted[sorted.length - 1] ?? null,
  };
}

/** Sum and max of every metric over SUCCESS tasks; a metric nobody reported stays null. */
export function summarizeMetrics(tasks: ReadonlyArray<Readonly<Task>>): MetricSummaries {
  const summaries = emptyMetricSummaries();
  for (const task of tasks) {
    if (task.status !== "SUCCESS" || !task.metrics) continue;
    for (const name of TASK_METRIC_NAMES) {
      const value = task.metrics[name];
      if (value === null) continue;
      const summary = summaries[name];
      summary.sum = (summary.sum ?? 0) + value;
      summary.max = summary.max === null ? value : Math.max(summary.max, value);
    }
  }
  return summaries;
}

export function aggregateStage(store: EntityStore, key: StageKey): StageAggregate {
  const tasks = store.tasksOfStage(key.stageId, key.attemptId);
  const taskCounts = countTasks(tasks);
  const durations: number[] = [];
  for (const task of tasks) {
    const duration = taskDurationMs(task);
    if (duration !== null) durations.push(duration);
  }

  const stage = store.getStage(key.stageId, key.attemptId);
  const numTasks = stage?.numTasks ?? null;
  let progressPct: number | null = null;
  if (stage && PROGRESS_STATUSES.has(stage.status) && numTasks !== null && numTasks > 0) {
    const raw = (taskCounts.SUCCESS / numTasks) * 100;
    progressPct = Math.round(Math.min(100, Math.max(0, raw)) * 10) / 10;
  }

  return {
    taskCounts,
    totalTasks: tasks.length,
    duration: durationStats(durations),
    metrics: summarizeMetrics(tasks),
    progressPct,
  };
}

export function aggregateExecutor(store: EntityStore, executorId: string): ExecutorAggregate {
  const tasks = store.tasksOfExecutor(executorId);
  const counts = countTasks(tasks);
  let totalTaskTime = 0;
  for (const task of tasks) {
    totalTaskTime += taskDurationMs(task) ?? 0;
  }
  return {
    activeTasks: counts.RUNNING,
    completedTasks: counts.SUCCESS,
    failedTasks: counts.FAILED,
    killedTasks: counts.KILLED,
    totalTasks: tasks.length,
    totalTaskTime,
    metrics: summarizeMetrics(tasks),
  };
}

export function aggregateJob(store: EntityStore, jobId: number): JobAggregate {
  const job = store.getJob(jobId);
  const stageCounts = emptyStageCounts();
  const taskCounts = emptyTaskCounts();
  let expectedTasks = 0;
  if (!job) {
    return { stageCounts, durationMs: null, inProgress: false, taskCounts, expectedTasks };
  }

  for (const stageId of job.stageIds) {
    const latest = store.latestAttemptOf(stageId);
    if (!latest) continue;
    stageCounts[latest.status] += 1;
    expectedTasks += latest.numTasks ?? 0;
    for (const task of store.tasksOfStage(latest.stageId, latest.attemptId)) {
      taskCounts[task.status] += 1;
    }
  }

  return {
    stageCounts,
    durationMs: spanMs(job.submissionTime, job.completionTime),
    inProgress: job.status === "RUNNING",
    taskCounts,
    expectedTasks,
  };
}

export function aggregateApplication(store: EntityStore): ApplicationAggregate {
  const jobCounts: Record<JobStatus, number> = { RUNNING: 0, SUCCEEDED: 0, FAILED: 0 };
  for (const job of store.jobsInOrder()) jobCounts[job.status] += 1;

  const stageCounts = emptyStageCounts();
  for (const stage of store.stagesInOrder()) stageCounts[stage.status] += 1;

  const executorCounts: Record<ExecutorStatus, number> = { ACTIVE: 0, REMOVED: 0 };
  for (const executor of store.executorsInOrder()) executorCounts[executor.status] += 1;

  const application = store.getApplication();
  return {
    jobCounts,
    stageCounts,
    taskCounts: countTasks(store.tasksInOrder()),
    executorCounts,
    durationMs: application ? spanMs(application.startTime, application.endTime) : null,
  };
}
