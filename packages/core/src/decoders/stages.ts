import type { RddInfo } from "@eventscope/contracts";
import type { DecodedEvent, RecordDecoder, StageInfoRecord } from "./types.js";
import { asArray, isRecord, intList, optionalBoolean, optionalInt, optionalNumber, optionalString } from "../utils.js";
import { RecordDecodeError, requireInt, requireRecord } from "./common.js";

/** Storage levels are logged as flag objects; older logs may carry the description string. */
function storageLevelLabel(value: unknown): string {
  const label = optionalString(value);
  if (label !== null) return label;
  if (!isRecord(value)) return "NONE";
  const useDisk = optionalBoolean(value["Use Disk"]) ?? false;
  const useMemory = optionalBoolean(value["Use Memory"]) ?? false;
  if (!useDisk && !useMemory) return "NONE";
  const parts: string[] = [];
  if (useDisk) parts.push("Disk");
  if (useMemory) parts.push(optionalBoolean(value["Use Off Heap"]) ? "Memory (off heap)" : "Memory");
  parts.push(optionalBoolean(value.Deserialized) ? "Deserialized" : "Serialized");
  parts.push(`${optionalInt(value.Replication) ?? 1}x Replicated`);
  return parts.join(" ");
}

function decodeRddInfo(value: unknown): RddInfo | null {
  if (!isRecord(value)) return null;
  const rddId = optionalInt(value["RDD ID"]);
  if (rddId === null) return null;
  return {
    rddId,
    name: optionalString(value.Name) ?? `RDD ${rddId}`,
    numPartitions: optionalInt(value["Number of Partitions"]) ?? 0,
    storageLevel: storageLevelLabel(value["Storage Level"]),
    numCachedPartitions: optionalInt(value["Number of Cached Partitions"]) ?? 0,
    memorySize: optionalNumber(value["Memory Size"]) ?? 0,
    diskSize: optionalNumber(value["Disk Size"]) ?? 0,
  };
}

export function decodeStageInfo(info: Record<string, unknown>, eventName: string): StageInfoRecord {
  const failureReason = optionalString(info["Failure Reason"]);
  const rddInfo: RddInfo[] = [];
  for (const item of asArray(info["RDD Info"])) {
    const rdd = decodeRddInfo(item);
    if (rdd) rddInfo.push(rdd);
  }
  return {
    stageId: requireInt(info, "Stage ID", eventName),
    attemptId: optionalInt(info["Stage Attempt ID"]) ?? 0,
    name: optionalString(info["Stage Name"]),
    details: optionalString(info.Details),
    numTasks: optionalInt(info["Number of Tasks"]),
    parentIds: intList(info["Parent IDs"]),
    rddInfo,
    submissionTime: optionalNumber(info["Submission Time"]),
    completionTime: optionalNumber(info["Completion Time"]),
    failureReason,
  };
}

export class StageDecoder implements RecordDecoder {
  name = "stages";
  eventNames = ["SparkListenerStageSubmitted", "SparkListenerStageCompleted"] as const;

  decode(eventName: string, record: Record<string, unknown>): DecodedEvent {
    const stage = decodeStageInfo(requireRecord(record, "Stage Info", eventName), eventName);
    if (eventName === "SparkListenerStageSubmitted") {
      return { kind: "stageSubmitted", stage };
    }
    if (eventName === "SparkListenerStageCompleted") {
      return { kind: "stageCompleted", stage };
    }
    throw new RecordDecodeError(`${this.name} decoder cannot handle ${eventName}`);
  }
}
