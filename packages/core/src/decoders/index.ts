import type { DecodeResult, RecordDecoder } from "./types.js";
import { ApplicationDecoder } from "./application.js";
import { EnvironmentDecoder } from "./environment.js";
import { ExecutorDecoder } from "./executors.js";
import { JobDecoder } from "./jobs.js";
import { SqlExecutionDecoder } from "./sql.js";
import { StageDecoder } from "./stages.js";
import { TaskDecoder } from "./tasks.js";
import { RecordDecodeError, parseJsonLine } from "./common.js";

export const EVENT_DISCRIMINATOR = "Event";

export class DecoderRegistry {
  private readonly byEventName = new Map<string, RecordDecoder>();

  constructor(decoders?: RecordDecoder[]) {
    const list = decoders ?? [
      new ApplicationDecoder(),
      new JobDecoder(),
      new StageDecoder(),
      new TaskDecoder(),
      new ExecutorDecoder(),
      new EnvironmentDecoder(),
      new SqlExecutionDecoder(),
    ];
    for (const decoder of list) {
      for (const eventName of decoder.eventNames) {
        this.byEventName.set(eventName, decoder);
      }
    }
  }

  knownEventNames(): string[] {
    return Array.from(this.byEventName.keys()).sort();
  }

  decodeRecord(record: Record<string, unknown>): DecodeResult {
    const eventName = record[EVENT_DISCRIMINATOR];
    if (typeof eventName !== "string" || !eventName.trim()) {
      return { kind: "failure", message: `missing "${EVENT_DISCRIMINATOR}" discriminator` };
    }
    const decoder = this.byEventName.get(eventName);
    if (!decoder) {
      return { kind: "unrecognized", eventName };
    }
    try {
      return { kind: "event", eventName, event: decoder.decode(eventName, record) };
    } catch (error) {
      if (error instanceof RecordDecodeError) {
        return { kind: "failure", message: error.message };
      }
      throw error;
    }
  }

  decodeLine(line: string): DecodeResult {
    const trimmed = line.trim();
    if (!trimmed) {
      return { kind: "blank" };
    }
    const parsed = parseJsonLine(trimmed);
    if (!parsed.ok) {
      return { kind: "failure", message: parsed.message };
    }
    return this.decodeRecord(parsed.value);
  }
}

export type { DecodeResult, DecodedEvent, DecodedEventKind, RecordDecoder } from "./types.js";
