/**
 * Known failures carry an HTTP status and a stable code so the error
 * middleware and the frontend can tell them apart.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/** Geocoder had no match (or timed out) for the starting address. */
export class OriginNotFoundError extends HttpError {
  constructor(address: string) {
    super(422, 'ORIGIN_NOT_FOUND', 'Address not found, correct it and try again.', { address });
  }
}

/** School file missing or unusable; nothing can be rendered. */
export class SchoolDataError extends HttpError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(503, 'SCHOOL_DATA_UNAVAILABLE', message, details);
  }
}
