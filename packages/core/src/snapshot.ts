import { ENVIRONMENT_CATEGORIES } from "@eventscope/contracts";
import type {
  AppConfig,
  ApplicationSnapshot,
  ApplicationView,
  EnvironmentSectionView,
  Executor,
  ExecutorView,
  Job,
  JobView,
  LoadDiagnostics,
  LoadState,
  SqlExecution,
  SqlExecutionView,
  StageAggregate,
  StageAttempt,
  StageDetail,
  StageKey,
  StageView,
  Task,
  TaskView,
} from "@eventscope/contracts";
import {
  aggregateApplication,
  aggregateExecutor,
  aggregateJob,
  aggregateStage,
  spanMs,
  taskDurationMs,
} from "./aggregator.js";
import { IN_PROGRESS, MISSING, formatBytes, formatDuration, formatTasks, statusLabel, sumOf } from "./format.js";
import { createRedactor } from "./redaction.js";
import { compareTasks, type EntityStore } from "./store.js";
import { compactText, deepFreeze } from "./utils.js";

function compareKeys(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function buildApplicationView(store: EntityStore): ApplicationView {
  const application = store.getApplication();
  const totals = aggregateApplication(store);
  return {
    appId: application?.appId ?? MISSING,
    name: application?.name ?? MISSING,
    attemptId: application?.attemptId ?? MISSING,
    user: application?.user ?? MISSING,
    sparkVersion: application?.sparkVersion ?? MISSING,
    status: application?.status ?? "RUNNING",
    startTime: application?.startTime ?? null,
    endTime: application?.endTime ?? null,
    duration: formatDuration(totals.durationMs),
    totals,
  };
}

function jobDescription(store: EntityStore, job: Readonly<Job>, maxLength: number): string {
  if (job.description) return compactText(job.description, maxLength);
  const lastStageId = job.stageIds[job.stageIds.length - 1];
  const lastStageName = lastStageId === undefined ? null : store.latestAttemptOf(lastStageId)?.name ?? null;
  return lastStageName ? compactText(lastStageName, maxLength) : MISSING;
}

function buildJobView(store: EntityStore, job: Readonly<Job>, config: AppConfig): JobView {
  const aggregate = aggregateJob(store, job.jobId);
  return {
    jobId: job.jobId,
    description: jobDescription(store, job, config.display.maxValueLength),
    status: job.status,
    statusLabel: statusLabel(job.status),
    submissionTime: job.submissionTime,
    completionTime: job.completionTime,
    durationMs: aggregate.durationMs,
    duration: aggregate.inProgress ? IN_PROGRESS : formatDuration(aggregate.durationMs),
    stageIds: [...job.stageIds],
    stageCounts: aggregate.stageCounts,
    tasksLabel: formatTasks(
      aggregate.taskCounts.SUCCESS,
      aggregate.expectedTasks,
      aggregate.taskCounts.FAILED,
      aggregate.taskCounts.KILLED,
    ),
    failureReason: job.failureReason,
    sqlExecutionId: job.sqlExecutionId,
  };
}

function buildStageView(store: EntityStore, stage: Readonly<StageAttempt>, aggregate: StageAggregate): StageView {
  const { metrics, taskCounts } = aggregate;
  const durationMs = spanMs(stage.submissionTime, stage.completionTime);
  return {
    stageId: stage.stageId,
    attemptId: stage.attemptId,
    name: stage.name ?? MISSING,
    status: stage.status,
    statusLabel: statusLabel(stage.status),
    submissionTime: stage.submissionTime,
    completionTime: stage.completionTime,
    durationMs,
    duration: formatDuration(durationMs),
    numTasks: stage.numTasks,
    jobIds: [...store.jobIdsOwningStage(stage.stageId)],
    rddCount: stage.rddInfo.length,
    tasksLabel: formatTasks(taskCounts.SUCCESS, stage.numTasks, taskCounts.FAILED, taskCounts.KILLED),
    progressPct: aggregate.progressPct,
    taskCounts,
    taskDuration: aggregate.duration,
    inputBytes: formatBytes(metrics.inputBytesRead.sum),
    outputBytes: formatBytes(metrics.outputBytesWritten.sum),
    shuffleReadBytes: formatBytes(sumOf(metrics.shuffleRemoteBytesRead.sum, metrics.shuffleLocalBytesRead.sum)),
    shuffleWriteBytes: formatBytes(metrics.shuffleBytesWritten.sum),
    spillBytes: formatBytes(metrics.diskBytesSpilled.sum),
    gcTime: formatDuration(metrics.jvmGcTime.sum),
    failureReason: stage.failureReason,
    metrics,
  };
}

export function buildTaskView(task: Readonly<Task>): TaskView {
  const durationMs = taskDurationMs(task);
  const metrics = task.metrics;
  return {
    taskId: task.taskId,
    index: task.index,
    attempt: task.attempt,
    stageId: task.stageId,
    stageAttemptId: task.stageAttemptId,
    executorId: task.executorId,
    host: task.host ?? MISSING,
    status: task.status,
    statusLabel: statusLabel(task.status),
    launchTime: task.launchTime,
    durationMs,
    duration: formatDuration(durationMs),
    gcTime: formatDuration(metrics?.jvmGcTime ?? null),
    inputBytes: formatBytes(metrics?.inputBytesRead ?? null),
    outputBytes: formatBytes(metrics?.outputBytesWritten ?? null),
    spillBytes: formatBytes(metrics?.diskBytesSpilled ?? null),
    speculative: task.speculative,
    failureKind: task.failureKind,
    failureReason: task.failureReason,
  };
}

function buildExecutorView(store: EntityStore, executor: Readonly<Executor>): ExecutorView {
  const aggregate = aggregateExecutor(store, executor.executorId);
  const { metrics } = aggregate;
  return {
    executorId: executor.executorId,
    host: executor.host ?? MISSING,
    status: executor.status,
    statusLabel: statusLabel(executor.status),
    totalCores: executor.totalCores,
    maxMemory: formatBytes(executor.maxMemory),
    addTime: executor.addTime,
    removeTime: executor.removeTime,
    removeReason: executor.removeReason,
    activeTasks: aggregate.activeTasks,
    tasksLabel: formatTasks(aggregate.completedTasks, aggregate.totalTasks, aggregate.failedTasks, aggregate.killedTasks),
    failedTasks: aggregate.failedTasks,
    taskTime: formatDuration(aggregate.totalTaskTime),
    gcTime: formatDuration(metrics.jvmGcTime.sum),
    inputBytes: formatBytes(metrics.inputBytesRead.sum),
    shuffleReadBytes: formatBytes(sumOf(metrics.shuffleRemoteBytesRead.sum, metrics.shuffleLocalBytesRead.sum)),
    shuffleWriteBytes: formatBytes(metrics.shuffleBytesWritten.sum),
    metrics,
  };
}

function buildEnvironmentViews(store: EntityStore, config: AppConfig): EnvironmentSectionView[] {
  const redact = createRedactor(config.redaction);
  const sections: EnvironmentSectionView[] = [];
  for (const category of ENVIRONMENT_CATEGORIES) {
    const pairs = store.getEnvironmentCategory(category);
    if (!pairs) continue;
    const entries = [...pairs]
      .sort((left, right) => compareKeys(left[0], right[0]))
      .map(([key, value]) => [key, compactText(redact(key, value), config.display.maxValueLength)] as const);
    sections.push({ category, entries });
  }
  return sections;
}

function buildSqlView(execution: Readonly<SqlExecution>, config: AppConfig): SqlExecutionView {
  const durationMs = spanMs(execution.startTime, execution.endTime);
  return {
    executionId: execution.executionId,
    description: execution.description ? compactText(execution.description, config.display.maxValueLength) : MISSING,
    status: execution.status,
    statusLabel: statusLabel(execution.status),
    startTime: execution.startTime,
    durationMs,
    duration: formatDuration(durationMs),
    jobIds: [...execution.jobIds],
    errorMessage: execution.errorMessage,
  };
}

/**
 * Reads the store once and returns display-ready, deep-frozen views. The store
 * is never mutated.
 */
export function buildSnapshot(
  store: EntityStore,
  diagnostics: LoadDiagnostics,
  load: LoadState,
  config: AppConfig,
): ApplicationSnapshot {
  const snapshot: ApplicationSnapshot = {
    application: buildApplicationView(store),
    jobs: store.jobsInOrder().map((job) => buildJobView(store, job, config)),
    stages: store.stagesInOrder().map((stage) => buildStageView(store, stage, aggregateStage(store, stage))),
    tasks: store.tasksInOrder().map(buildTaskView),
    executors: store.executorsInOrder().map((executor) => buildExecutorView(store, executor)),
    environment: buildEnvironmentViews(store, config),
    sql: store.sqlExecutionsInOrder().map((execution) => buildSqlView(execution, config)),
    diagnostics: structuredClone(diagnostics),
    load: { ...load, sources: [...load.sources] },
  };
  return deepFreeze(snapshot);
}

/** One stage attempt with its tasks in (launchTime, taskId) order. */
export function buildStageDetail(store: EntityStore, key: StageKey): StageDetail | undefined {
  const stage = store.getStage(key.stageId, key.attemptId);
  if (!stage) return undefined;
  const aggregate = aggregateStage(store, key);
  const tasks = [...store.tasksOfStage(key.stageId, key.attemptId)]
    .sort(compareTasks)
    .map(buildTaskView);
  return deepFreeze({
    stage: buildStageView(store, stage, aggregate),
    rdds: stage.rddInfo.map((rdd) => ({ ...rdd })),
    tasks,
    aggregate,
  });
}
