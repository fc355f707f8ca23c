export type HarnessErrorKind = "configuration" | "connection" | "validation" | "action" | "evaluation";

export class HarnessError extends Error {
  constructor(
    public readonly kind: HarnessErrorKind,
    public readonly code: string,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/** Missing or contradictory settings. Fatal at startup or at first session acquisition. */
export class ConfigurationError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("configuration", code, message, details);
  }
}

/** Vendor unreachable, auth rejected, browser dropped. */
export class ConnectionError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("connection", code, message, details);
  }
}

export class ValidationError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("validation", code, message, details);
  }
}

/** A single browser step failed; the task may continue. */
export class ActionError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("action", code, message, details);
  }
}

export class EvaluationError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super("evaluation", code, message, details);
  }
}

export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function reasonCodeOf(error: unknown, fallback: string): string {
  return isHarnessError(error) ? error.code : fallback;
}
