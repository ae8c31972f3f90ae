import type { DecodedEvent, RecordDecoder, StageInfoRecord } from "./types.js";
import { asArray, asRecord, intList, isRecord, optionalNumber, optionalString } from "../utils.js";
import { RecordDecodeError, requireInt, stringProperties } from "./common.js";
import { decodeStageInfo } from "./stages.js";

function decodeStageInfos(value: unknown, eventName: string): StageInfoRecord[] {
  const out: StageInfoRecord[] = [];
  for (const item of asArray(value)) {
    if (!isRecord(item)) continue;
    try {
      out.push(decodeStageInfo(item, eventName));
    } catch (error) {
      // a malformed nested stage info only loses that entry
      if (!(error instanceof RecordDecodeError)) throw error;
    }
  }
  return out;
}

export class JobDecoder implements RecordDecoder {
  name = "jobs";
  eventNames = ["SparkListenerJobStart", "SparkListenerJobEnd"] as const;

  decode(eventName: string, record: Record<string, unknown>): DecodedEvent {
    const jobId = requireInt(record, "Job ID", eventName);
    if (eventName === "SparkListenerJobStart") {
      const stageInfos = decodeStageInfos(record["Stage Infos"], eventName);
      const stageIds = intList(record["Stage IDs"]);
      for (const info of stageInfos) {
        if (!stageIds.includes(info.stageId)) stageIds.push(info.stageId);
      }
      return {
        kind: "jobStart",
        jobId,
        submissionTime: optionalNumber(record["Submission Time"]),
        stageIds,
        stageInfos,
        properties: stringProperties(record.Properties),
      };
    }
    if (eventName === "SparkListenerJobEnd") {
      const result = asRecord(record["Job Result"]);
      const exception = asRecord(result.Exception);
      return {
        kind: "jobEnd",
        jobId,
        completionTime: optionalNumber(record["Completion Time"]),
        result: optionalString(result.Result),
        failureMessage: optionalString(exception.Message),
      };
    }
    throw new RecordDecodeError(`${this.name} decoder cannot handle ${eventName}`);
  }
}
