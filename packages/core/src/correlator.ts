import { ENVIRONMENT_CATEGORIES } from "@eventscope/contracts";
import type {
  Application,
  Executor,
  Job,
  SqlExecution,
  StageAttempt,
  StageKey,
  Task,
} from "@eventscope/contracts";
import type { DecodedEvent, StageInfoRecord, TaskInfoRecord } from "./decoders/types.js";
import type { Diagnostics } from "./diagnostics.js";
import type { EntityStore } from "./store.js";
import type { TaskEndClassifier } from "./taskEndReasons.js";

type EventOf<K extends DecodedEvent["kind"]> = Extract<DecodedEvent, { kind: K }>;

export const UNKNOWN_EXECUTOR_ID = "unknown";
export const JOB_SUCCEEDED_RESULT = "JobSucceeded";

const TERMINAL_STAGE_STATUSES = new Set<StageAttempt["status"]>(["COMPLETE", "FAILED"]);

function prefer<T>(next: T | null, current: T | null): T | null {
  return next ?? current;
}

function parseExecutionId(value: string | undefined): number | null {
  if (value === undefined || !value.trim()) return null;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : null;
}

export function placeholderApplication(): Application {
  return {
    appId: null,
    name: null,
    attemptId: null,
    user: null,
    sparkVersion: null,
    startTime: null,
    endTime: null,
    status: "RUNNING",
  };
}

export function placeholderJob(jobId: number): Job {
  return {
    jobId,
    submissionTime: null,
    completionTime: null,
    status: "RUNNING",
    stageIds: [],
    failureReason: null,
    description: null,
    jobGroup: null,
    sqlExecutionId: null,
  };
}

export function placeholderStage(key: StageKey): StageAttempt {
  return {
    stageId: key.stageId,
    attemptId: key.attemptId,
    name: null,
    details: null,
    numTasks: null,
    parentIds: [],
    rddInfo: [],
    submissionTime: null,
    completionTime: null,
    status: "PENDING",
    failureReason: null,
    taskIds: [],
  };
}

export function placeholderTask(taskId: number, stage: StageKey, executorId: string): Task {
  return {
    taskId,
    index: null,
    attempt: null,
    stageId: stage.stageId,
    stageAttemptId: stage.attemptId,
    executorId,
    host: null,
    launchTime: null,
    finishTime: null,
    speculative: false,
    locality: null,
    status: "RUNNING",
    endReason: null,
    failureReason: null,
    failureKind: null,
    metrics: null,
  };
}

export function placeholderExecutor(executorId: string): Executor {
  return {
    executorId,
    host: null,
    totalCores: null,
    maxMemory: null,
    addTime: null,
    removeTime: null,
    removeReason: null,
    status: "ACTIVE",
  };
}

export function placeholderSqlExecution(executionId: number): SqlExecution {
  return {
    executionId,
    description: null,
    details: null,
    physicalPlanDescription: null,
    startTime: null,
    endTime: null,
    status: "RUNNING",
    errorMessage: null,
    jobIds: [],
  };
}

function applyStageInfo(stage: StageAttempt, info: StageInfoRecord): void {
  stage.name = prefer(info.name, stage.name);
  stage.details = prefer(info.details, stage.details);
  stage.numTasks = prefer(info.numTasks, stage.numTasks);
  if (info.parentIds.length > 0) stage.parentIds = [...info.parentIds];
  if (info.rddInfo.length > 0) stage.rddInfo = info.rddInfo.map((rdd) => ({ ...rdd }));
  stage.submissionTime = prefer(info.submissionTime, stage.submissionTime);
}

function applyTaskInfo(task: Task, info: TaskInfoRecord, stage: StageKey, executorId: string): void {
  task.stageId = stage.stageId;
  task.stageAttemptId = stage.attemptId;
  task.executorId = executorId;
  task.index = prefer(info.index, task.index);
  task.attempt = prefer(info.attempt, task.attempt);
  task.host = prefer(info.host, task.host);
  task.launchTime = prefer(info.launchTime, task.launchTime);
  task.speculative = info.speculative || task.speculative;
  task.locality = prefer(info.locality, task.locality);
}

/**
 * Routes decoded events into the store, one at a time, creating placeholder
 * parents for identifiers it has not seen yet.
 */
export class Correlator {
  private readonly store: EntityStore;
  private readonly classifier: TaskEndClassifier;
  private readonly diagnostics: Diagnostics;
  private applicationStarted = false;

  constructor(store: EntityStore, classifier: TaskEndClassifier, diagnostics: Diagnostics) {
    this.store = store;
    this.classifier = classifier;
    this.diagnostics = diagnostics;
  }

  apply(event: DecodedEvent, lineNumber: number): void {
    switch (event.kind) {
      case "logStart":
        this.store.upsertApplication(placeholderApplication, (application) => {
          application.sparkVersion = prefer(event.sparkVersion, application.sparkVersion);
        });
        return;
      case "applicationStart":
        this.onApplicationStart(event, lineNumber);
        return;
      case "applicationEnd":
        this.store.upsertApplication(placeholderApplication, (application) => {
          application.endTime = prefer(event.timestamp, application.endTime);
          application.status = "FINISHED";
        });
        return;
      case "jobStart":
        this.onJobStart(event);
        return;
      case "jobEnd":
        this.onJobEnd(event);
        return;
      case "stageSubmitted":
        this.onStageSubmitted(event);
        return;
      case "stageCompleted":
        this.onStageCompleted(event);
        return;
      case "taskStart":
        this.onTaskStart(event);
        return;
      case "taskEnd":
        this.onTaskEnd(event);
        return;
      case "executorAdded":
        this.store.upsertExecutor(event.executorId, () => placeholderExecutor(event.executorId), (executor) => {
          executor.host = prefer(event.host, executor.host);
          executor.totalCores = prefer(event.totalCores, executor.totalCores);
          executor.addTime = prefer(event.timestamp, executor.addTime);
        });
        return;
      case "executorRemoved":
        this.store.upsertExecutor(event.executorId, () => placeholderExecutor(event.executorId), (executor) => {
          executor.removeTime = prefer(event.timestamp, executor.removeTime);
          executor.removeReason = prefer(event.reason, executor.removeReason);
          executor.status = "REMOVED";
        });
        return;
      case "blockManagerAdded":
        this.store.upsertExecutor(event.executorId, () => placeholderExecutor(event.executorId), (executor) => {
          executor.host = executor.host ?? event.host;
          executor.maxMemory = prefer(event.maxMemory, executor.maxMemory);
          executor.addTime = executor.addTime ?? event.timestamp;
        });
        return;
      case "environmentUpdate":
        for (const category of ENVIRONMENT_CATEGORIES) {
          const pairs = event.sections[category];
          if (pairs) this.store.replaceEnvironmentCategory(category, pairs);
        }
        return;
      case "sqlExecutionStart":
        this.store.upsertSqlExecution(event.executionId, () => placeholderSqlExecution(event.executionId), (execution) => {
          execution.description = prefer(event.description, execution.description);
          execution.details = prefer(event.details, execution.details);
          execution.physicalPlanDescription = prefer(event.physicalPlanDescription, execution.physicalPlanDescription);
          execution.startTime = prefer(event.time, execution.startTime);
        });
        return;
      case "sqlExecutionEnd":
        this.store.upsertSqlExecution(event.executionId, () => placeholderSqlExecution(event.executionId), (execution) => {
          execution.endTime = prefer(event.time, execution.endTime);
          execution.errorMessage = event.errorMessage;
          execution.status = event.errorMessage ? "FAILED" : "COMPLETED";
        });
        return;
    }
  }

  private onApplicationStart(event: EventOf<"applicationStart">, lineNumber: number): void {
    if (this.applicationStarted) {
      const current = this.store.getApplication();
      const kept = current?.appId ?? "<unknown>";
      const ignored = event.appId ?? "<unknown>";
      this.diagnostics.warning(
        lineNumber,
        `second application start (${ignored}) ignored; keeping application ${kept}`,
      );
      return;
    }
    this.applicationStarted = true;
    this.store.upsertApplication(placeholderApplication, (application) => {
      application.appId = prefer(event.appId, application.appId);
      application.name = prefer(event.name, application.name);
      application.attemptId = prefer(event.attemptId, application.attemptId);
      application.user = prefer(event.user, application.user);
      application.startTime = prefer(event.timestamp, application.startTime);
    });
  }

  private ensureStage(key: StageKey): void {
    this.store.upsertStage(key, () => placeholderStage(key), () => undefined);
  }

  private ensureExecutor(executorId: string): void {
    this.store.upsertExecutor(executorId, () => placeholderExecutor(executorId), () => undefined);
  }

  private onJobStart(event: EventOf<"jobStart">): void {
    for (const info of event.stageInfos) {
      this.store.upsertStage(info, () => placeholderStage(info), (stage) => {
        stage.name = stage.name ?? info.name;
        stage.details = stage.details ?? info.details;
        stage.numTasks = stage.numTasks ?? info.numTasks;
        if (stage.parentIds.length === 0) stage.parentIds = [...info.parentIds];
        if (stage.rddInfo.length === 0) stage.rddInfo = info.rddInfo.map((rdd) => ({ ...rdd }));
      });
    }

    const sqlExecutionId = parseExecutionId(event.properties["spark.sql.execution.id"]);
    this.store.upsertJob(event.jobId, () => placeholderJob(event.jobId), (job) => {
      job.submissionTime = prefer(event.submissionTime, job.submissionTime);
      for (const stageId of event.stageIds) {
        if (!job.stageIds.includes(stageId)) job.stageIds.push(stageId);
      }
      job.description = prefer(event.properties["spark.job.description"] ?? null, job.description);
      job.jobGroup = prefer(event.properties["spark.jobGroup.id"] ?? null, job.jobGroup);
      job.sqlExecutionId = prefer(sqlExecutionId, job.sqlExecutionId);
    });

    if (sqlExecutionId !== null) {
      this.store.upsertSqlExecution(sqlExecutionId, () => placeholderSqlExecution(sqlExecutionId), (execution) => {
        if (!execution.jobIds.includes(event.jobId)) execution.jobIds.push(event.jobId);
      });
    }
  }

  private onJobEnd(event: EventOf<"jobEnd">): void {
    const job = this.store.upsertJob(event.jobId, () => placeholderJob(event.jobId), (target) => {
      target.completionTime = prefer(event.completionTime, target.completionTime);
      if (event.result === JOB_SUCCEEDED_RESULT) {
        target.status = "SUCCEEDED";
        target.failureReason = null;
      } else {
        target.status = "FAILED";
        target.failureReason = event.failureMessage ?? event.result;
      }
    });

    for (const stageId of job.stageIds) {
      for (const attempt of this.store.attemptsOf(stageId)) {
        if (attempt.status !== "PENDING") continue;
        this.store.upsertStage(attempt, () => placeholderStage(attempt), (stage) => {
          stage.status = "SKIPPED";
        });
      }
    }
  }

  private onStageSubmitted(event: EventOf<"stageSubmitted">): void {
    const { stage: info } = event;
    const attempts = this.store.attemptsOf(info.stageId);
    const supersededByLater = attempts.some(
      (attempt) => attempt.attemptId > info.attemptId && attempt.status !== "PENDING",
    );

    for (const attempt of attempts) {
      if (attempt.attemptId >= info.attemptId) continue;
      if (attempt.status !== "PENDING" && attempt.status !== "ACTIVE") continue;
      this.store.upsertStage(attempt, () => placeholderStage(attempt), (stage) => {
        stage.status = "SKIPPED";
      });
    }

    this.store.upsertStage(info, () => placeholderStage(info), (stage) => {
      applyStageInfo(stage, info);
      if (TERMINAL_STAGE_STATUSES.has(stage.status)) return;
      stage.status = supersededByLater ? "SKIPPED" : "ACTIVE";
    });
  }

  private onStageCompleted(event: EventOf<"stageCompleted">): void {
    const { stage: info } = event;
    this.store.upsertStage(info, () => placeholderStage(info), (stage) => {
      applyStageInfo(stage, info);
      stage.completionTime = prefer(info.completionTime, stage.completionTime);
      stage.failureReason = info.failureReason;
      stage.status = info.failureReason !== null ? "FAILED" : "COMPLETE";
    });
  }

  private onTaskStart(event: EventOf<"taskStart">): void {
    const stageKey: StageKey = { stageId: event.stageId, attemptId: event.stageAttemptId };
    const executorId = event.task.executorId ?? UNKNOWN_EXECUTOR_ID;
    this.ensureStage(stageKey);
    this.ensureExecutor(executorId);
    this.store.upsertTask(event.task.taskId, () => placeholderTask(event.task.taskId, stageKey, executorId), (task) => {
      applyTaskInfo(task, event.task, stageKey, executorId);
    });
  }

  private onTaskEnd(event: EventOf<"taskEnd">): void {
    const stageKey: StageKey = { stageId: event.stageId, attemptId: event.stageAttemptId };
    const existing = this.store.getTask(event.task.taskId);
    const executorId = event.task.executorId ?? existing?.executorId ?? UNKNOWN_EXECUTOR_ID;
    this.ensureStage(stageKey);
    this.ensureExecutor(executorId);

    const outcome = this.classifier.classify(event.endReason, event.task);
    this.store.upsertTask(event.task.taskId, () => placeholderTask(event.task.taskId, stageKey, executorId), (task) => {
      applyTaskInfo(task, event.task, stageKey, executorId);
      task.finishTime = prefer(event.task.finishTime, task.finishTime);
      task.status = outcome.status;
      task.endReason = outcome.endReason;
      task.failureReason = outcome.failureReason;
      task.failureKind = outcome.failureKind;
      task.metrics = event.metrics ? { ...event.metrics } : null;
    });
  }
}
