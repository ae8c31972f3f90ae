import type { TaskMetrics } from "@eventscope/contracts";
import type { DecodedEvent, RecordDecoder, TaskEndReasonRecord, TaskInfoRecord } from "./types.js";
import { asRecord, isRecord, optionalBoolean, optionalInt, optionalNumber, optionalString } from "../utils.js";
import { RecordDecodeError, requireInt, requireRecord } from "./common.js";

const REASON_DETAIL_FIELDS = ["Kill Reason", "Loss Reason", "Message"] as const;

function firstNumber(record: Record<string, unknown>, fields: string[]): number | null {
  for (const field of fields) {
    const value = optionalNumber(record[field]);
    if (value !== null) return value;
  }
  return null;
}

export function decodeTaskInfo(info: Record<string, unknown>, eventName: string): TaskInfoRecord {
  const executorId = optionalString(info["Executor ID"]);
  return {
    taskId: requireInt(info, "Task ID", eventName),
    index: optionalInt(info.Index),
    attempt: optionalInt(info.Attempt),
    executorId: executorId && executorId.trim() ? executorId : null,
    host: optionalString(info.Host),
    launchTime: optionalNumber(info["Launch Time"]),
    finishTime: optionalNumber(info["Finish Time"]) || null,
    speculative: optionalBoolean(info.Speculative) ?? false,
    locality: optionalString(info.Locality),
    failed: optionalBoolean(info.Failed),
    killed: optionalBoolean(info.Killed),
  };
}

export function decodeTaskEndReason(value: unknown): TaskEndReasonRecord | null {
  if (!isRecord(value)) return null;
  const reason = optionalString(value.Reason);
  if (!reason) return null;

  const className = optionalString(value["Class Name"]);
  const description = optionalString(value.Description);
  let detail: string | null = null;
  if (className || description) {
    detail = [className, description].filter((part): part is string => Boolean(part)).join(": ");
  } else {
    for (const field of REASON_DETAIL_FIELDS) {
      const candidate = optionalString(value[field]);
      if (candidate) {
        detail = candidate;
        break;
      }
    }
  }
  return { reason, detail };
}

export function decodeTaskMetrics(value: unknown): TaskMetrics | null {
  if (!isRecord(value)) return null;
  const shuffleRead = asRecord(value["Shuffle Read Metrics"]);
  const shuffleWrite = asRecord(value["Shuffle Write Metrics"]);
  const input = asRecord(value["Input Metrics"]);
  const output = asRecord(value["Output Metrics"]);

  return {
    executorRunTime: optionalNumber(value["Executor Run Time"]),
    executorCpuTime: optionalNumber(value["Executor CPU Time"]),
    executorDeserializeTime: optionalNumber(value["Executor Deserialize Time"]),
    resultSize: optionalNumber(value["Result Size"]),
    jvmGcTime: optionalNumber(value["JVM GC Time"]),
    resultSerializationTime: optionalNumber(value["Result Serialization Time"]),
    memoryBytesSpilled: optionalNumber(value["Memory Bytes Spilled"]),
    diskBytesSpilled: optionalNumber(value["Disk Bytes Spilled"]),
    peakExecutionMemory: optionalNumber(value["Peak Execution Memory"]),
    shuffleRemoteBytesRead: optionalNumber(shuffleRead["Remote Bytes Read"]),
    shuffleLocalBytesRead: optionalNumber(shuffleRead["Local Bytes Read"]),
    shuffleFetchWaitTime: optionalNumber(shuffleRead["Fetch Wait Time"]),
    shuffleRecordsRead: firstNumber(shuffleRead, ["Total Records Read", "Records Read"]),
    shuffleBytesWritten: firstNumber(shuffleWrite, ["Shuffle Bytes Written", "Bytes Written"]),
    shuffleWriteTime: firstNumber(shuffleWrite, ["Shuffle Write Time", "Write Time"]),
    shuffleRecordsWritten: firstNumber(shuffleWrite, ["Shuffle Records Written", "Records Written"]),
    inputBytesRead: optionalNumber(input["Bytes Read"]),
    inputRecordsRead: optionalNumber(input["Records Read"]),
    outputBytesWritten: optionalNumber(output["Bytes Written"]),
    outputRecordsWritten: optionalNumber(output["Records Written"]),
  };
}

export class TaskDecoder implements RecordDecoder {
  name = "tasks";
  eventNames = ["SparkListenerTaskStart", "SparkListenerTaskEnd"] as const;

  decode(eventName: string, record: Record<string, unknown>): DecodedEvent {
    const task = decodeTaskInfo(requireRecord(record, "Task Info", eventName), eventName);
    const stageId = requireInt(record, "Stage ID", eventName);
    const stageAttemptId = optionalInt(record["Stage Attempt ID"]) ?? 0;

    if (eventName === "SparkListenerTaskStart") {
      return { kind: "taskStart", stageId, stageAttemptId, task };
    }
    if (eventName === "SparkListenerTaskEnd") {
      return {
        kind: "taskEnd",
        stageId,
        stageAttemptId,
        taskType: optionalString(record["Task Type"]),
        task,
        endReason: decodeTaskEndReason(record["Task End Reason"]),
        metrics: decodeTaskMetrics(record["Task Metrics"]),
      };
    }
    throw new RecordDecodeError(`${this.name} decoder cannot handle ${eventName}`);
  }
}
