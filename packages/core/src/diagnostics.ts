import type { AnomalyRecord, DecodeFailureRecord, LoadDiagnostics } from "@eventscope/contracts";

/** Tallies content-level anomalies of one load; nothing here ever throws. */
export class Diagnostics {
  private linesRead = 0;
  private eventsApplied = 0;
  private decodeFailureCount = 0;
  private warningCount = 0;
  private readonly decodeFailures: DecodeFailureRecord[] = [];
  private readonly unrecognized = new Map<string, number>();
  private readonly warnings: AnomalyRecord[] = [];
  private readonly maxRecords: number;

  constructor(maxRecords: number) {
    this.maxRecords = Math.max(0, maxRecords);
  }

  lineRead(): void {
    this.linesRead += 1;
  }

  eventApplied(): void {
    this.eventsApplied += 1;
  }

  decodeFailure(lineNumber: number, message: string): void {
    this.decodeFailureCount += 1;
    if (this.decodeFailures.length < this.maxRecords) {
      this.decodeFailures.push({ lineNumber, message });
    }
  }

  unrecognizedEvent(eventName: string): void {
    this.unrecognized.set(eventName, (this.unrecognized.get(eventName) ?? 0) + 1);
  }

  warning(lineNumber: number, message: string): void {
    this.warningCount += 1;
    if (this.warnings.length < this.maxRecords) {
      this.warnings.push({ lineNumber, message });
    }
  }

  summary(): LoadDiagnostics {
    let unrecognizedCount = 0;
    for (const count of this.unrecognized.values()) unrecognizedCount += count;
    return {
      linesRead: this.linesRead,
      eventsApplied: this.eventsApplied,
      linesSkipped: this.decodeFailureCount + unrecognizedCount,
      decodeFailureCount: this.decodeFailureCount,
      decodeFailures: this.decodeFailures.map((record) => ({ ...record })),
      unrecognizedCount,
      unrecognized: Array.from(this.unrecognized.entries())
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
        .map(([name, count]) => ({ name, count })),
      warningCount: this.warningCount,
      warnings: this.warnings.map((record) => ({ ...record })),
    };
  }
}
