import type {
  Application,
  EnvironmentCategory,
  Executor,
  Job,
  PropertyPair,
  SqlExecution,
  StageAttempt,
  StageKey,
  Task,
} from "@eventscope/contracts";

export function stageKeyId(stageId: number, attemptId: number): string {
  return `${stageId}.${attemptId}`;
}

function appendUnique<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const list = index.get(key);
  if (!list) {
    index.set(key, [value]);
    return;
  }
  if (!list.includes(value)) list.push(value);
}

function removeValue<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const list = index.get(key);
  if (!list) return;
  const position = list.indexOf(value);
  if (position >= 0) list.splice(position, 1);
}

/** Launch time ascending, unknown launch times last, then task id. */
export function compareTasks(left: Readonly<Task>, right: Readonly<Task>): number {
  const leftLaunch = left.launchTime ?? Number.POSITIVE_INFINITY;
  const rightLaunch = right.launchTime ?? Number.POSITIVE_INFINITY;
  if (leftLaunch !== rightLaunch) return leftLaunch < rightLaunch ? -1 : 1;
  return left.taskId - right.taskId;
}

/** Submission time ascending, unknown submission times last, then job id. */
export function compareJobs(left: Readonly<Job>, right: Readonly<Job>): number {
  const leftSubmitted = left.submissionTime ?? Number.POSITIVE_INFINITY;
  const rightSubmitted = right.submissionTime ?? Number.POSITIVE_INFINITY;
  if (leftSubmitted !== rightSubmitted) return leftSubmitted < rightSubmitted ? -1 : 1;
  return left.jobId - right.jobId;
}

/**
 * Owns every reconstructed entity, keyed by natural identifier.
 *
 * Lookups never create entities; placeholders come from the `init` factory the
 * caller passes to an upsert. Relationship fields hold identifiers only.
 */
export class EntityStore {
  private application: Application | null = null;
  private readonly jobs = new Map<number, Job>();
  private readonly stages = new Map<string, StageAttempt>();
  private readonly attemptsByStageId = new Map<number, number[]>();
  private readonly jobIdsByStageId = new Map<number, number[]>();
  private readonly tasks = new Map<number, Task>();
  private readonly taskIdsByExecutor = new Map<string, number[]>();
  private readonly executors = new Map<string, Executor>();
  private readonly sqlExecutions = new Map<number, SqlExecution>();
  private readonly environment = new Map<EnvironmentCategory, PropertyPair[]>();
  private sortedStageKeys: string[] | null = null;
  private sortedTaskIds: number[] | null = null;

  getApplication(): Readonly<Application> | undefined {
    return this.application ?? undefined;
  }

  upsertApplication(init: () => Application, apply: (application: Application) => void): Readonly<Application> {
    const application = this.application ?? init();
    apply(application);
    this.application = application;
    return application;
  }

  getJob(jobId: number): Readonly<Job> | undefined {
    return this.jobs.get(jobId);
  }

  upsertJob(jobId: number, init: () => Job, apply: (job: Job) => void): Readonly<Job> {
    let job = this.jobs.get(jobId);
    if (!job) {
      job = init();
      this.jobs.set(jobId, job);
    }
    apply(job);
    for (const stageId of job.stageIds) {
      appendUnique(this.jobIdsByStageId, stageId, jobId);
    }
    return job;
  }

  jobIdsOwningStage(stageId: number): readonly number[] {
    return this.jobIdsByStageId.get(stageId) ?? [];
  }

  getStage(stageId: number, attemptId: number): Readonly<StageAttempt> | undefined {
    return this.stages.get(stageKeyId(stageId, attemptId));
  }

  upsertStage(key: StageKey, init: () => StageAttempt, apply: (stage: StageAttempt) => void): Readonly<StageAttempt> {
    const id = stageKeyId(key.stageId, key.attemptId);
    let stage = this.stages.get(id);
    if (!stage) {
      stage = init();
      this.stages.set(id, stage);
      const attempts = this.attemptsByStageId.get(key.stageId) ?? [];
      attempts.push(key.attemptId);
      attempts.sort((a, b) => a - b);
      this.attemptsByStageId.set(key.stageId, attempts);
      this.sortedStageKeys = null;
    }
    apply(stage);
    return stage;
  }

  attemptsOf(stageId: number): Array<Readonly<StageAttempt>> {
    const out: StageAttempt[] = [];
    for (const attemptId of this.attemptsByStageId.get(stageId) ?? []) {
      const stage = this.stages.get(stageKeyId(stageId, attemptId));
      if (stage) out.push(stage);
    }
    return out;
  }

  latestAttemptOf(stageId: number): Readonly<StageAttempt> | undefined {
    const attempts = this.attemptsOf(stageId);
    return attempts[attempts.length - 1];
  }

  getTask(taskId: number): Readonly<Task> | undefined {
    return this.tasks.get(taskId);
  }

  upsertTask(taskId: number, init: () => Task, apply: (task: Task) => void): Readonly<Task> {
    const existing = this.tasks.get(taskId);
    const task = existing ?? init();
    const previous = existing
      ? { executorId: existing.executorId, stageId: existing.stageId, stageAttemptId: existing.stageAttemptId, launchTime: existing.launchTime }
      : null;
    apply(task);
    this.tasks.set(taskId, task);

    if (!previous || previous.launchTime !== task.launchTime) {
      this.sortedTaskIds = null;
    }
    if (previous && previous.executorId !== task.executorId) {
      removeValue(this.taskIdsByExecutor, previous.executorId, taskId);
    }
    appendUnique(this.taskIdsByExecutor, task.executorId, taskId);

    if (previous && (previous.stageId !== task.stageId || previous.stageAttemptId !== task.stageAttemptId)) {
      const previousStage = this.stages.get(stageKeyId(previous.stageId, previous.stageAttemptId));
      if (previousStage) {
        const position = previousStage.taskIds.indexOf(taskId);
        if (position >= 0) previousStage.taskIds.splice(position, 1);
      }
    }
    const stage = this.stages.get(stageKeyId(task.stageId, task.stageAttemptId));
    if (stage && !stage.taskIds.includes(taskId)) {
      stage.taskIds.push(taskId);
    }
    return task;
  }

  tasksOfStage(stageId: number, attemptId: number): Array<Readonly<Task>> {
    const stage = this.stages.get(stageKeyId(stageId, attemptId));
    if (!stage) return [];
    return this.resolveTasks(stage.taskIds);
  }

  tasksOfExecutor(executorId: string): Array<Readonly<Task>> {
    return this.resolveTasks(this.taskIdsByExecutor.get(executorId) ?? []);
  }

  getExecutor(executorId: string): Readonly<Executor> | undefined {
    return this.executors.get(executorId);
  }

  upsertExecutor(executorId: string, init: () => Executor, apply: (executor: Executor) => void): Readonly<Executor> {
    let executor = this.executors.get(executorId);
    if (!executor) {
      executor = init();
      this.executors.set(executorId, executor);
    }
    apply(executor);
    return executor;
  }

  getSqlExecution(executionId: number): Readonly<SqlExecution> | undefined {
    return this.sqlExecutions.get(executionId);
  }

  upsertSqlExecution(
    executionId: number,
    init: () => SqlExecution,
    apply: (execution: SqlExecution) => void,
  ): Readonly<SqlExecution> {
    let execution = this.sqlExecutions.get(executionId);
    if (!execution) {
      execution = init();
      this.sqlExecutions.set(executionId, execution);
    }
    apply(execution);
    return execution;
  }

  replaceEnvironmentCategory(category: EnvironmentCategory, pairs: readonly PropertyPair[]): void {
    this.environment.set(category, pairs.map(([key, value]) => [key, value] as const));
  }

  getEnvironmentCategory(category: EnvironmentCategory): readonly PropertyPair[] | undefined {
    return this.environment.get(category);
  }

  jobsInOrder(): Array<Readonly<Job>> {
    return Array.from(this.jobs.values()).sort(compareJobs);
  }

  stagesInOrder(): Array<Readonly<StageAttempt>> {
    if (!this.sortedStageKeys) {
      this.sortedStageKeys = Array.from(this.stages.entries())
        .sort(([, left], [, right]) => left.stageId - right.stageId || left.attemptId - right.attemptId)
        .map(([id]) => id);
    }
    const out: StageAttempt[] = [];
    for (const id of this.sortedStageKeys) {
      const stage = this.stages.get(id);
      if (stage) out.push(stage);
    }
    return out;
  }

  tasksInOrder(): Array<Readonly<Task>> {
    if (!this.sortedTaskIds) {
      this.sortedTaskIds = Array.from(this.tasks.values())
        .sort(compareTasks)
        .map((task) => task.taskId);
    }
    return this.resolveTasks(this.sortedTaskIds);
  }

  executorsInOrder(): Array<Readonly<Executor>> {
    return Array.from(this.executors.values());
  }

  sqlExecutionsInOrder(): Array<Readonly<SqlExecution>> {
    return Array.from(this.sqlExecutions.values()).sort((a, b) => a.executionId - b.executionId);
  }

  counts(): { jobs: number; stages: number; tasks: number; executors: number; sqlExecutions: number } {
    return {
      jobs: this.jobs.size,
      stages: this.stages.size,
      tasks: this.tasks.size,
      executors: this.executors.size,
      sqlExecutions: this.sqlExecutions.size,
    };
  }

  private resolveTasks(taskIds: readonly number[]): Array<Readonly<Task>> {
    const out: Task[] = [];
    for (const taskId of taskIds) {
      const task = this.tasks.get(taskId);
      if (task) out.push(task);
    }
    return out;
  }
}
