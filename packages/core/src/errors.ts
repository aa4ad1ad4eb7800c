export class TraceNotFoundError extends Error {
  readonly eventId: string;

  constructor(eventId: string) {
    super(`trace not found: ${eventId}`);
    this.name = "TraceNotFoundError";
    this.eventId = eventId;
  }
}

export class TraceFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`cannot read trace file ${filePath}: ${reason}`);
    this.name = "TraceFileError";
    this.filePath = filePath;
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
