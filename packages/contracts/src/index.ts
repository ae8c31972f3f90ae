export type ApplicationStatus = "RUNNING" | "FINISHED";
export type JobStatus = "RUNNING" | "SUCCEEDED" | "FAILED";
export type StageStatus = "PENDING" | "ACTIVE" | "COMPLETE" | "FAILED" | "SKIPPED";
export type TaskStatus = "RUNNING" | "SUCCESS" | "FAILED" | "KILLED";
export type ExecutorStatus = "ACTIVE" | "REMOVED";
export type SqlExecutionStatus = "RUNNING" | "COMPLETED" | "FAILED";
export type LoadStatus = "idle" | "loading" | "complete" | "aborted";

export type EnvironmentCategory =
  | "JVM Information"
  | "Spark Properties"
  | "System Properties"
  | "Classpath Entries"
  | "Hadoop Properties";

export const ENVIRONMENT_CATEGORIES: readonly EnvironmentCategory[] = [
  "JVM Information",
  "Spark Properties",
  "System Properties",
  "Classpath Entries",
  "Hadoop Properties",
];

export interface LoadConfig {
  maxDiagnostics: number;
  progressEveryLines: number;
}

export interface TaskEndClassificationRule {
  pattern: string;
  label: string;
}

export interface TaskEndReasonConfig {
  successReasons: string[];
  killIndicators: string[];
  classifications: TaskEndClassificationRule[];
}

export interface DisplayConfig {
  maxValueLength: number;
  taskListLimit: number;
}

export interface RedactionConfig {
  enabled: boolean;
  pattern: string;
  replacement: string;
}

export interface AppConfig {
  load: LoadConfig;
  taskEndReasons: TaskEndReasonConfig;
  display: DisplayConfig;
  redaction: RedactionConfig;
}

export interface TaskMetrics {
  executorRunTime: number | null;
  executorCpuTime: number | null;
  executorDeserializeTime: number | null;
  resultSize: number | null;
  jvmGcTime: number | null;
  resultSerializationTime: number | null;
  memoryBytesSpilled: number | null;
  diskBytesSpilled: number | null;
  peakExecutionMemory: number | null;
  shuffleRemoteBytesRead: number | null;
  shuffleLocalBytesRead: number | null;
  shuffleFetchWaitTime: number | null;
  shuffleRecordsRead: number | null;
  shuffleBytesWritten: number | null;
  shuffleWriteTime: number | null;
  shuffleRecordsWritten: number | null;
  inputBytesRead: number | null;
  inputRecordsRead: number | null;
  outputBytesWritten: number | null;
  outputRecordsWritten: number | null;
}

export type TaskMetricName = keyof TaskMetrics;

export const TASK_METRIC_NAMES: readonly TaskMetricName[] = [
  "executorRunTime",
  "executorCpuTime",
  "executorDeserializeTime",
  "resultSize",
  "jvmGcTime",
  "resultSerializationTime",
  "memoryBytesSpilled",
  "diskBytesSpilled",
  "peakExecutionMemory",
  "shuffleRemoteBytesRead",
  "shuffleLocalBytesRead",
  "shuffleFetchWaitTime",
  "shuffleRecordsRead",
  "shuffleBytesWritten",
  "shuffleWriteTime",
  "shuffleRecordsWritten",
  "inputBytesRead",
  "inputRecordsRead",
  "outputBytesWritten",
  "outputRecordsWritten",
];

export interface Application {
  appId: string | null;
  name: string | null;
  attemptId: string | null;
  user: string | null;
  sparkVersion: string | null;
  startTime: number | null;
  endTime: number | null;
  status: ApplicationStatus;
}

export interface Job {
  jobId: number;
  submissionTime: number | null;
  completionTime: number | null;
  status: JobStatus;
  stageIds: number[];
  failureReason: string | null;
  description: string | null;
  jobGroup: string | null;
  sqlExecutionId: number | null;
}

export interface StageKey {
  stageId: number;
  attemptId: number;
}

export interface RddInfo {
  rddId: number;
  name: string;
  numPartitions: number;
  storageLevel: string;
  numCachedPartitions: number;
  memorySize: number;
  diskSize: number;
}

export interface StageAttempt extends StageKey {
  name: string | null;
  details: string | null;
  numTasks: number | null;
  parentIds: number[];
  rddInfo: RddInfo[];
  submissionTime: number | null;
  completionTime: number | null;
  status: StageStatus;
  failureReason: string | null;
  taskIds: number[];
}

export interface Task {
  taskId: number;
  index: number | null;
  attempt: number | null;
  stageId: number;
  stageAttemptId: number;
  executorId: string;
  host: string | null;
  launchTime: number | null;
  finishTime: number | null;
  speculative: boolean;
  locality: string | null;
  status: TaskStatus;
  endReason: string | null;
  failureReason: string | null;
  failureKind: string | null;
  metrics: TaskMetrics | null;
}

export interface Executor {
  executorId: string;
  host: string | null;
  totalCores: number | null;
  maxMemory: number | null;
  addTime: number | null;
  removeTime: number | null;
  removeReason: string | null;
  status: ExecutorStatus;
}

export interface SqlExecution {
  executionId: number;
  description: string | null;
  details: string | null;
  physicalPlanDescription: string | null;
  startTime: number | null;
  endTime: number | null;
  status: SqlExecutionStatus;
  errorMessage: string | null;
  jobIds: number[];
}

export type PropertyPair = readonly [key: string, value: string];

export interface MetricSummary {
  sum: number | null;
  max: number | null;
}

export type MetricSummaries = Record<TaskMetricName, MetricSummary>;

export interface DurationStats {
  min: number | null;
  median: number | null;
  max: number | null;
}

export type TaskStatusCounts = Record<TaskStatus, number>;
export type StageStatusCounts = Record<StageStatus, number>;

export interface StageAggregate {
  taskCounts: TaskStatusCounts;
  totalTasks: number;
  duration: DurationStats;
  metrics: MetricSummaries;
  progressPct: number | null;
}

export interface ExecutorAggregate {
  activeTasks: number;
  completedTasks: number;
  failedTasks: number;
  killedTasks: number;
  totalTasks: number;
  totalTaskTime: number;
  metrics: MetricSummaries;
}

export interface JobAggregate {
  stageCounts: StageStatusCounts;
  durationMs: number | null;
  inProgress: boolean;
  taskCounts: TaskStatusCounts;
  expectedTasks: number;
}

export interface ApplicationAggregate {
  jobCounts: Record<JobStatus, number>;
  stageCounts: StageStatusCounts;
  taskCounts: TaskStatusCounts;
  executorCounts: Record<ExecutorStatus, number>;
  durationMs: number | null;
}

export interface DecodeFailureRecord {
  lineNumber: number;
  message: string;
}

export interface AnomalyRecord {
  lineNumber: number;
  message: string;
}

export interface NamedCount {
  name: string;
  count: number;
}

export interface LoadDiagnostics {
  linesRead: number;
  eventsApplied: number;
  linesSkipped: number;
  decodeFailureCount: number;
  decodeFailures: DecodeFailureRecord[];
  unrecognizedCount: number;
  unrecognized: NamedCount[];
  warningCount: number;
  warnings: AnomalyRecord[];
}

export interface LoadState {
  status: LoadStatus;
  sources: string[];
  startedAtMs: number | null;
  finishedAtMs: number | null;
}

export interface ApplicationView {
  appId: string;
  name: string;
  attemptId: string;
  user: string;
  sparkVersion: string;
  status: ApplicationStatus;
  startTime: number | null;
  endTime: number | null;
  duration: string;
  totals: ApplicationAggregate;
}

export interface JobView {
  jobId: number;
  description: string;
  status: JobStatus;
  statusLabel: string;
  submissionTime: number | null;
  completionTime: number | null;
  durationMs: number | null;
  duration: string;
  stageIds: number[];
  stageCounts: StageStatusCounts;
  tasksLabel: string;
  failureReason: string | null;
  sqlExecutionId: number | null;
}

export interface StageView {
  stageId: number;
  attemptId: number;
  name: string;
  status: StageStatus;
  statusLabel: string;
  submissionTime: number | null;
  completionTime: number | null;
  durationMs: number | null;
  duration: string;
  numTasks: number | null;
  jobIds: number[];
  rddCount: number;
  tasksLabel: string;
  progressPct: number | null;
  taskCounts: TaskStatusCounts;
  taskDuration: DurationStats;
  inputBytes: string;
  outputBytes: string;
  shuffleReadBytes: string;
  shuffleWriteBytes: string;
  spillBytes: string;
  gcTime: string;
  failureReason: string | null;
  metrics: MetricSummaries;
}

export interface TaskView {
  taskId: number;
  index: number | null;
  attempt: number | null;
  stageId: number;
  stageAttemptId: number;
  executorId: string;
  host: string;
  status: TaskStatus;
  statusLabel: string;
  launchTime: number | null;
  durationMs: number | null;
  duration: string;
  gcTime: string;
  inputBytes: string;
  outputBytes: string;
  spillBytes: string;
  speculative: boolean;
  failureKind: string | null;
  failureReason: string | null;
}

export interface ExecutorView {
  executorId: string;
  host: string;
  status: ExecutorStatus;
  statusLabel: string;
  totalCores: number | null;
  maxMemory: string;
  addTime: number | null;
  removeTime: number | null;
  removeReason: string | null;
  activeTasks: number;
  tasksLabel: string;
  failedTasks: number;
  taskTime: string;
  gcTime: string;
  inputBytes: string;
  shuffleReadBytes: string;
  shuffleWriteBytes: string;
  metrics: MetricSummaries;
}

export interface EnvironmentSectionView {
  category: EnvironmentCategory;
  entries: PropertyPair[];
}

export interface SqlExecutionView {
  executionId: number;
  description: string;
  status: SqlExecutionStatus;
  statusLabel: string;
  startTime: number | null;
  durationMs: number | null;
  duration: string;
  jobIds: number[];
  errorMessage: string | null;
}

export interface ApplicationSnapshot {
  application: ApplicationView;
  jobs: JobView[];
  stages: StageView[];
  tasks: TaskView[];
  executors: ExecutorView[];
  environment: EnvironmentSectionView[];
  sql: SqlExecutionView[];
  diagnostics: LoadDiagnostics;
  load: LoadState;
}

export interface StageDetail {
  stage: StageView;
  rdds: RddInfo[];
  tasks: TaskView[];
  aggregate: StageAggregate;
}

export interface DiscoveredEventLog {
  id: string;
  path: string;
  kind: "file" | "rolling";
  parts: string[];
  inProgress: boolean;
  sizeBytes: number;
  mtimeMs: number;
}

export interface ProgressEvent {
  linesRead: number;
  eventsApplied: number;
  linesSkipped: number;
}
