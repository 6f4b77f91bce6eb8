// Error taxonomy shared by the kernel and the orchestrator.
//
// Every error carries a stable `code`; callers branch on the class or the code,
// never on the message text.

export type MitigationErrorCode =
  | "UNSUPPORTED_CIRCUIT"
  | "BACKEND_UNAVAILABLE"
  | "INVALID_PARAMETER"
  | "SUBMISSION_FAILED"
  | "INVALID_REQUEST"
  | "REQUEST_CANCELLED"
  | "CONFIG_OVERRIDE_REJECTED";

export class MitigationError extends Error {
  public readonly code: MitigationErrorCode;

  constructor(code: MitigationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MitigationError";
    this.code = code;
  }
}

/** Missing or inconsistent layout metadata, or an instruction the scheduler cannot place. */
export class UnsupportedCircuitError extends MitigationError {
  constructor(message: string) {
    super("UNSUPPORTED_CIRCUIT", message);
    this.name = "UnsupportedCircuitError";
  }
}

/** Simulated, unreachable, slow or malformed calibration source. */
export class BackendUnavailableError extends MitigationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BACKEND_UNAVAILABLE", message, options);
    this.name = "BackendUnavailableError";
  }
}

export class InvalidParameterError extends MitigationError {
  constructor(message: string) {
    super("INVALID_PARAMETER", message);
    this.name = "InvalidParameterError";
  }
}

/** The execution boundary refused a job; status and body are kept verbatim. */
export class SubmissionError extends MitigationError {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string) {
    super("SUBMISSION_FAILED", `submission rejected with status ${status}`);
    this.name = "SubmissionError";
    this.status = status;
    this.body = body;
  }
}

export class InvalidRequestError extends MitigationError {
  constructor(message: string) {
    super("INVALID_REQUEST", message);
    this.name = "InvalidRequestError";
  }
}

export class RequestCancelledError extends MitigationError {
  constructor(message = "request cancelled") {
    super("REQUEST_CANCELLED", message);
    this.name = "RequestCancelledError";
  }
}
