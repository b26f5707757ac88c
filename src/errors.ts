// ============================================================================
// Faults
// ============================================================================
// Every failure a tool call can hit, plus the Outcome type the pipeline
// stages pass between each other instead of throwing.
// ============================================================================

export type FaultKind = 'InvalidInput' | 'ValidationError' | 'UpstreamError' | 'TelemetryError';

export class ToolFault extends Error {
  constructor(
    readonly kind: FaultKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
  }
}

/** Malformed JSON or a top level that is not an object */
export class InvalidInputError extends ToolFault {
  constructor(message: string, options?: { cause?: unknown }) {
    super('InvalidInput', message, options);
  }
}

/** Missing, mistyped or mis-shaped parameter */
export class ValidationError extends ToolFault {
  constructor(
    readonly field: string,
    message: string
  ) {
    super('ValidationError', message);
  }
}

/** Data engine call failure or unexpected response shape */
export class UpstreamError extends ToolFault {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UpstreamError', message, options);
  }
}

/** Telemetry log read, parse or write failure */
export class TelemetryError extends ToolFault {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TelemetryError', message, options);
  }
}

// ============================================================================
// Outcome
// ============================================================================

export type Outcome<T> = { ok: true; value: T } | { ok: false; fault: ToolFault };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail(fault: ToolFault): Outcome<never> {
  return { ok: false, fault };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
