import { HttpError, formatErrorBody } from "./http.js";

export class BridgeError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
  }
}

export class ConfigurationError extends BridgeError {
  constructor(message: string) {
    super(message, "CONFIGURATION");
    this.name = "ConfigurationError";
  }
}

/** No usable Microsoft token: the user has to (re)run the OAuth login. */
export class AuthRequiredError extends BridgeError {
  readonly loginUrl?: string;

  constructor(message = "Microsoft authentication required", loginUrl?: string) {
    super(message, "AUTH_REQUIRED");
    this.name = "AuthRequiredError";
    this.loginUrl = loginUrl;
  }
}

/** The provider answered, but not with what the operation needed. */
export class RemoteApiError extends BridgeError {
  readonly status?: number;
  readonly body?: unknown;

  constructor(message: string, status?: number, body?: unknown) {
    super(message, "REMOTE_REJECTED");
    this.name = "RemoteApiError";
    this.status = status;
    this.body = body;
  }

  static fromHttpError(error: HttpError, message?: string): RemoteApiError {
    return new RemoteApiError(
      message ?? `Microsoft Graph returned ${error.status}: ${formatErrorBody(error.body)}`,
      error.status,
      error.body,
    );
  }
}

export class RecordNotFoundError extends BridgeError {
  constructor(kind: string, name: string) {
    super(`${kind} '${name}' not found`, "NOT_FOUND");
    this.name = "RecordNotFoundError";
  }
}

export class RecordValidationError extends BridgeError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(message, "VALIDATION");
    this.name = "RecordValidationError";
    this.problems = problems;
  }
}

export class RecordPermissionError extends BridgeError {
  constructor(message: string) {
    super(message, "PERMISSION");
    this.name = "RecordPermissionError";
  }
}

export type FailureKind = "auth_required" | "remote_rejected" | "failed";

export interface FailureDescription {
  kind: FailureKind;
  message: string;
  loginUrl?: string;
}

/** Maps any thrown value onto the three user-facing failure messages. */
export function describeFailure(error: unknown): FailureDescription {
  if (error instanceof AuthRequiredError) {
    return {
      kind: "auth_required",
      message: "Authentication with Microsoft is required.",
      loginUrl: error.loginUrl,
    };
  }
  if (error instanceof RemoteApiError || error instanceof HttpError) {
    return {
      kind: "remote_rejected",
      message: "Microsoft rejected the request.",
    };
  }
  return {
    kind: "failed",
    message: "The operation failed.",
  };
}
