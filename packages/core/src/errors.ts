/** The event log could not be opened or read; raised before any line is processed. */
export class EventLogSourceError extends Error {
  readonly sourcePath: string;

  constructor(sourcePath: string, message: string) {
    super(`${sourcePath}: ${message}`);
    this.name = "EventLogSourceError";
    this.sourcePath = sourcePath;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
