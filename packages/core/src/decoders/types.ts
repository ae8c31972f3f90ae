import type { EnvironmentCategory, PropertyPair, RddInfo, TaskMetrics } from "@eventscope/contracts";

export interface StageInfoRecord {
  stageId: number;
  attemptId: number;
  name: string | null;
  details: string | null;
  numTasks: number | null;
  parentIds: number[];
  rddInfo: RddInfo[];
  submissionTime: number | null;
  completionTime: number | null;
  failureReason: string | null;
}

export interface TaskInfoRecord {
  taskId: number;
  index: number | null;
  attempt: number | null;
  executorId: string | null;
  host: string | null;
  launchTime: number | null;
  finishTime: number | null;
  speculative: boolean;
  locality: string | null;
  failed: boolean | null;
  killed: boolean | null;
}

export interface TaskEndReasonRecord {
  reason: string;
  detail: string | null;
}

export type DecodedEvent =
  | { kind: "logStart"; sparkVersion: string | null }
  | {
      kind: "applicationStart";
      appId: string | null;
      name: string | null;
      attemptId: string | null;
      user: string | null;
      timestamp: number | null;
    }
  | { kind: "applicationEnd"; timestamp: number | null }
  | {
      kind: "jobStart";
      jobId: number;
      submissionTime: number | null;
      stageIds: number[];
      stageInfos: StageInfoRecord[];
      properties: Record<string, string>;
    }
  | {
      kind: "jobEnd";
      jobId: number;
      completionTime: number | null;
      result: string | null;
      failureMessage: string | null;
    }
  | { kind: "stageSubmitted"; stage: StageInfoRecord }
  | { kind: "stageCompleted"; stage: StageInfoRecord }
  | { kind: "taskStart"; stageId: number; stageAttemptId: number; task: TaskInfoRecord }
  | {
      kind: "taskEnd";
      stageId: number;
      stageAttemptId: number;
      taskType: string | null;
      task: TaskInfoRecord;
      endReason: TaskEndReasonRecord | null;
      metrics: TaskMetrics | null;
    }
  | {
      kind: "executorAdded";
      executorId: string;
      timestamp: number | null;
      host: string | null;
      totalCores: number | null;
    }
  | { kind: "executorRemoved"; executorId: string; timestamp: number | null; reason: string | null }
  | {
      kind: "blockManagerAdded";
      executorId: string;
      host: string | null;
      maxMemory: number | null;
      timestamp: number | null;
    }
  | { kind: "environmentUpdate"; sections: Partial<Record<EnvironmentCategory, PropertyPair[]>> }
  | {
      kind: "sqlExecutionStart";
      executionId: number;
      description: string | null;
      details: string | null;
      physicalPlanDescription: string | null;
      time: number | null;
    }
  | { kind: "sqlExecutionEnd"; executionId: number; time: number | null; errorMessage: string | null };

export type DecodedEventKind = DecodedEvent["kind"];

export type DecodeResult =
  | { kind: "event"; eventName: string; event: DecodedEvent }
  | { kind: "unrecognized"; eventName: string }
  | { kind: "failure"; message: string }
  | { kind: "blank" };

export interface RecordDecoder {
  name: string;
  eventNames: readonly string[];
  decode(eventName: string, record: Record<string, unknown>): DecodedEvent;
}
