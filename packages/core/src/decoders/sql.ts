import type { DecodedEvent, RecordDecoder } from "./types.js";
import { optionalNumber, optionalString } from "../utils.js";
import { RecordDecodeError, requireInt } from "./common.js";

export const SQL_EXECUTION_START = "org.apache.spark.sql.execution.ui.SparkListenerSQLExecutionStart";
export const SQL_EXECUTION_END = "org.apache.spark.sql.execution.ui.SparkListenerSQLExecutionEnd";

export class SqlExecutionDecoder implements RecordDecoder {
  name = "sql";
  eventNames = [SQL_EXECUTION_START, SQL_EXECUTION_END] as const;

  decode(eventName: string, record: Record<string, unknown>): DecodedEvent {
    const executionId = requireInt(record, "executionId", eventName);
    if (eventName === SQL_EXECUTION_START) {
      return {
        kind: "sqlExecutionStart",
        executionId,
        description: optionalString(record.description),
        details: optionalString(record.details),
        physicalPlanDescription: optionalString(record.physicalPlanDescription),
        time: optionalNumber(record.time),
      };
    }
    if (eventName === SQL_EXECUTION_END) {
      const errorMessage = optionalString(record.errorMessage);
      return {
        kind: "sqlExecutionEnd",
        executionId,
        time: optionalNumber(record.time),
        errorMessage: errorMessage && errorMessage.trim() ? errorMessage : null,
      };
    }
    throw new RecordDecodeError(`${this.name} decoder cannot handle ${eventName}`);
  }
}
