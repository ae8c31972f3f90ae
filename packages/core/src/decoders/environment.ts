import { ENVIRONMENT_CATEGORIES, type EnvironmentCategory, type PropertyPair } from "@eventscope/contracts";
import type { DecodedEvent, RecordDecoder } from "./types.js";
import { RecordDecodeError, propertyPairs } from "./common.js";

export class EnvironmentDecoder implements RecordDecoder {
  name = "environment";
  eventNames = ["SparkListenerEnvironmentUpdate"] as const;

  decode(eventName: string, record: Record<string, unknown>): DecodedEvent {
    if (eventName !== "SparkListenerEnvironmentUpdate") {
      throw new RecordDecodeError(`${this.name} decoder cannot handle ${eventName}`);
    }
    const sections: Partial<Record<EnvironmentCategory, PropertyPair[]>> = {};
    for (const category of ENVIRONMENT_CATEGORIES) {
      const value = record[category];
      if (value === undefined || value === null) continue;
      sections[category] = propertyPairs(value);
    }
    return { kind: "environmentUpdate", sections };
  }
}
