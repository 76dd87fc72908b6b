/**
 * Exception hierarchy for the Prior SDK.
 *
 * Every failure raised by the SDK is a `PriorError`; the subclasses only
 * add detail for callers that want it.
 */

export class PriorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PriorError";
  }
}

export class NetworkError extends PriorError {
  cause?: Error;

  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = "NetworkError";
    this.cause = options?.cause;
  }
}

export class RequestTimeoutError extends NetworkError {
  constructor(message: string = "Request timed out.", options?: { cause?: Error }) {
    super(message, options);
    this.name = "RequestTimeoutError";
  }
}

export class APIError extends PriorError {
  statusCode: number;
  payload: unknown;
  requestId: string | null;

  constructor(options: {
    statusCode: number;
    message: string;
    payload?: unknown;
    requestId?: string | null;
  }) {
    super(options.message);
    this.name = "APIError";
    this.statusCode = options.statusCode;
    this.payload = options.payload ?? null;
    this.requestId = options.requestId ?? null;
  }
}

/** The server answered 2xx but the body was not JSON. */
export class ResponseParseError extends PriorError {
  statusCode: number;
  text: string;

  constructor(options: { statusCode: number; text: string; message?: string }) {
    super(options.message ?? `Invalid JSON in response (status ${options.statusCode}).`);
    this.name = "ResponseParseError";
    this.statusCode = options.statusCode;
    this.text = options.text;
  }
}

export class RegistrationError extends PriorError {
  cause?: Error;

  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = "RegistrationError";
    this.cause = options?.cause;
  }
}

export interface ToolInputIssue {
  path: string;
  message: string;
}

export class ToolInputError extends PriorError {
  tool: string;
  issues: ToolInputIssue[];

  constructor(tool: string, issues: ToolInputIssue[]) {
    super(
      `Invalid input for ${tool}: ${issues.map((i) => `${i.path} ${i.message}`).join("; ")}`,
    );
    this.name = "ToolInputError";
    this.tool = tool;
    this.issues = issues;
  }
}
