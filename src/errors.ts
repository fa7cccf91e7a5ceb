export class AppError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export type FailureKind = "quota" | "auth";

export type CredentialFailure = {
  keyName: string;
  engineName: string;
  kind: FailureKind;
  message: string;
};

/** Every credential pair was rejected for quota or authorization reasons. */
export class SearchUnavailableError extends AppError {
  constructor(readonly failures: CredentialFailure[]) {
    super(
      failures.length
        ? `Search unavailable: all ${failures.length} credential(s) failed`
        : "Search unavailable: no credentials configured",
      503,
      "search_unavailable",
    );
  }
}

export class SearchFailedError extends AppError {
  constructor(
    message: string,
    readonly upstreamStatus?: number,
  ) {
    super(message, 502, "search_failed");
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    readonly details?: unknown,
  ) {
    super(message, 400, "invalid_request");
  }
}

export class AuthError extends AppError {
  constructor(message = "Login required") {
    super(message, 401, "unauthorized");
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden") {
    super(message, 403, "forbidden");
  }
}
