import type { DecodedEvent, RecordDecoder } from "./types.js";
import { optionalNumber, optionalString } from "../utils.js";
import { RecordDecodeError } from "./common.js";

export class ApplicationDecoder implements RecordDecoder {
  name = "application";
  eventNames = ["SparkListenerLogStart", "SparkListenerApplicationStart", "SparkListenerApplicationEnd"] as const;

  decode(eventName: string, record: Record<string, unknown>): DecodedEvent {
    switch (eventName) {
      case "SparkListenerLogStart":
        return { kind: "logStart", sparkVersion: optionalString(record["Spark Version"]) };
      case "SparkListenerApplicationStart":
        return {
          kind: "applicationStart",
          appId: optionalString(record["App ID"]),
          name: optionalString(record["App Name"]),
          attemptId: optionalString(record["App Attempt ID"]),
          user: optionalString(record.User),
          timestamp: optionalNumber(record.Timestamp),
        };
      case "SparkListenerApplicationEnd":
        return { kind: "applicationEnd", timestamp: optionalNumber(record.Timestamp) };
      default:
        throw new RecordDecodeError(`${this.name} decoder cannot handle ${eventName}`);
    }
  }
}
