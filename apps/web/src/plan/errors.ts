import type { MalformedPlanReason } from "./types";

export class MalformedPlanError extends Error {
  readonly reason: MalformedPlanReason;
  readonly lineNumber: number | null;

  constructor(reason: MalformedPlanReason, message: string, lineNumber: number | null = null) {
    super(lineNumber != null ? `${message} (line ${lineNumber})` : message);
    this.name = "MalformedPlanError";
    this.reason = reason;
    this.lineNumber = lineNumber;
  }
}

export function isMalformedPlanError(e: unknown): e is MalformedPlanError {
  return e instanceof MalformedPlanError;
}
