import { EventEmitter } from "node:events";
import { createReadStream } from "node:fs";
import { open } from "node:fs/promises";
import readline from "node:readline";
import type {
  AppConfig,
  ApplicationSnapshot,
  LoadDiagnostics,
  LoadState,
  ProgressEvent,
  StageDetail,
} from "@eventscope/contracts";
import { loadConfig } from "./config.js";
import { Correlator } from "./correlator.js";
import { DecoderRegistry, type DecodeResult } from "./decoders/index.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { Diagnostics } from "./diagnostics.js";
import { resolveEventLogSource, type EventLogSource } from "./discovery.js";
import { EventLogSourceError, errorMessage } from "./errors.js";
import { buildSnapshot, buildStageDetail } from "./snapshot.js";
import { EntityStore } from "./store.js";
import { TaskEndClassifier } from "./taskEndReasons.js";
import { nowMs } from "./utils.js";

export interface LoadOptions {
  signal?: AbortSignal;
}

async function assertReadable(parts: string[]): Promise<void> {
  for (const part of parts) {
    try {
      const handle = await open(part, "r");
      await handle.close();
    } catch (error) {
      throw new EventLogSourceError(part, `cannot read event log: ${errorMessage(error)}`);
    }
  }
}

/**
 * Owns one application's reconstructed state and feeds it lines, either one at
 * a time or from an event log on disk.
 *
 * Emits `"progress"` with a {@link ProgressEvent} every
 * `load.progressEveryLines` lines and once when a load ends, and `"loaded"`
 * with the final {@link LoadState}.
 */
export class EventLogSession extends EventEmitter {
  private readonly config: AppConfig;
  private readonly registry = new DecoderRegistry();
  private readonly store = new EntityStore();
  private readonly diagnostics: Diagnostics;
  private readonly correlator: Correlator;
  private lineNumber = 0;
  private loadState: LoadState = { status: "idle", sources: [], startedAtMs: null, finishedAtMs: null };

  constructor(config: AppConfig = DEFAULT_CONFIG) {
    super();
    this.config = config;
    this.diagnostics = new Diagnostics(config.load.maxDiagnostics);
    this.correlator = new Correlator(this.store, new TaskEndClassifier(config.taskEndReasons), this.diagnostics);
  }

  static async fromConfigPath(configPath?: string): Promise<EventLogSession> {
    const config = await loadConfig(configPath);
    return new EventLogSession(config);
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getStore(): EntityStore {
    return this.store;
  }

  getLoadState(): LoadState {
    return { ...this.loadState, sources: [...this.loadState.sources] };
  }

  getDiagnostics(): LoadDiagnostics {
    return this.diagnostics.summary();
  }

  ingestLine(line: string): DecodeResult {
    this.lineNumber += 1;
    this.diagnostics.lineRead();
    const result = this.registry.decodeLine(line);
    switch (result.kind) {
      case "event":
        this.correlator.apply(result.event, this.lineNumber);
        this.diagnostics.eventApplied();
        break;
      case "failure":
        this.diagnostics.decodeFailure(this.lineNumber, result.message);
        break;
      case "unrecognized":
        this.diagnostics.unrecognizedEvent(result.eventName);
        break;
      case "blank":
        break;
    }
    if (this.lineNumber % this.config.load.progressEveryLines === 0) {
      this.emitProgress();
    }
    return result;
  }

  ingestLines(lines: Iterable<string>): void {
    for (const line of lines) {
      this.ingestLine(line);
    }
  }

  /**
   * Reads every line of the event log at `inputPath`. Source problems throw
   * {@link EventLogSourceError} before the first line is applied; an abort
   * stops between lines and leaves the state consistent.
   */
  async load(inputPath: string, options: LoadOptions = {}): Promise<LoadState> {
    if (this.loadState.status === "loading") {
      throw new Error("a load is already in progress for this session");
    }
    const source = await resolveEventLogSource(inputPath);
    await assertReadable(source.parts);
    return this.loadSource(source, options);
  }

  private async loadSource(source: EventLogSource, options: LoadOptions): Promise<LoadState> {
    const { signal } = options;
    this.loadState = {
      status: "loading",
      sources: [...source.parts],
      startedAtMs: nowMs(),
      finishedAtMs: null,
    };

    let aborted = signal?.aborted ?? false;
    try {
      for (const part of source.parts) {
        if (aborted) break;
        aborted = await this.readPart(part, signal);
      }
    } catch (error) {
      this.finishLoad("aborted");
      throw new EventLogSourceError(source.path, `read failed: ${errorMessage(error)}`);
    }

    this.finishLoad(aborted ? "aborted" : "complete");
    return this.getLoadState();
  }

  /** Returns true when the signal stopped the read. */
  private async readPart(part: string, signal: AbortSignal | undefined): Promise<boolean> {
    const stream = createReadStream(part, { encoding: "utf8" });
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        if (signal?.aborted) return true;
        this.ingestLine(line);
      }
      return false;
    } finally {
      lines.close();
      stream.destroy();
    }
  }

  private finishLoad(status: "complete" | "aborted"): void {
    this.loadState = { ...this.loadState, status, finishedAtMs: nowMs() };
    this.emitProgress();
    this.emit("loaded", this.getLoadState());
  }

  private emitProgress(): void {
    const summary = this.diagnostics.summary();
    const progress: ProgressEvent = {
      linesRead: summary.linesRead,
      eventsApplied: summary.eventsApplied,
      linesSkipped: summary.linesSkipped,
    };
    this.emit("progress", progress);
  }

  snapshot(): ApplicationSnapshot {
    return buildSnapshot(this.store, this.diagnostics.summary(), this.getLoadState(), this.config);
  }

  stageDetail(stageId: number, attemptId: number): StageDetail | undefined {
    return buildStageDetail(this.store, { stageId, attemptId });
  }
}
