export class AppError extends Error {
  status: number;
  code: number;
  details?: Record<string, unknown>;

  constructor(status: number, code: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export class EmptyInputError extends AppError {
  constructor(message = 'Diary entry cannot be empty.') {
    super(400, 40011, message);
  }
}

export class UnauthenticatedError extends AppError {
  constructor(message = 'No user logged in.') {
    super(401, 40101, message);
  }
}

export class DuplicateEntryError extends AppError {
  constructor(date: string) {
    super(409, 40901, 'You already wrote a diary entry today. Only one per day allowed.', {
      date
    });
  }
}

export class StorageUnavailableError extends AppError {
  constructor(cause: unknown) {
    super(503, 50301, 'Storage is unavailable', {
      reason: cause instanceof Error ? cause.message : String(cause)
    });
  }
}

/** Raised by the text-generation client; callers fall back instead of surfacing it. */
export class RecommendationUnavailableError extends AppError {
  constructor(reason: string) {
    super(503, 50302, 'Recommendation service is unavailable', { reason });
  }
}
