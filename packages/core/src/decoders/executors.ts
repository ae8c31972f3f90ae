import type { DecodedEvent, RecordDecoder } from "./types.js";
import { asRecord, optionalInt, optionalNumber, optionalString } from "../utils.js";
import { RecordDecodeError, requireRecord, requireString } from "./common.js";

export class ExecutorDecoder implements RecordDecoder {
  name = "executors";
  eventNames = [
    "SparkListenerExecutorAdded",
    "SparkListenerExecutorRemoved",
    "SparkListenerBlockManagerAdded",
  ] as const;

  decode(eventName: string, record: Record<string, unknown>): DecodedEvent {
    switch (eventName) {
      case "SparkListenerExecutorAdded": {
        const info = asRecord(record["Executor Info"]);
        return {
          kind: "executorAdded",
          executorId: requireString(record, "Executor ID", eventName),
          timestamp: optionalNumber(record.Timestamp),
          host: optionalString(info.Host),
          totalCores: optionalInt(info["Total Cores"]),
        };
      }
      case "SparkListenerExecutorRemoved":
        return {
          kind: "executorRemoved",
          executorId: requireString(record, "Executor ID", eventName),
          timestamp: optionalNumber(record.Timestamp),
          reason: optionalString(record["Removed Reason"]),
        };
      case "SparkListenerBlockManagerAdded": {
        const blockManager = requireRecord(record, "Block Manager ID", eventName);
        return {
          kind: "blockManagerAdded",
          executorId: requireString(blockManager, "Executor ID", eventName),
          host: optionalString(blockManager.Host),
          maxMemory: optionalNumber(record["Maximum Memory"]),
          timestamp: optionalNumber(record.Timestamp),
        };
      }
      default:
        throw new RecordDecodeError(`${this.name} decoder cannot handle ${eventName}`);
    }
  }
}
