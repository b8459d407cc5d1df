export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly detail?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends AppError {
  constructor(message = 'Bad request', detail?: string) {
    super(message, 400, 'BAD_REQUEST', detail);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found', detail?: string) {
    super(message, 404, 'NOT_FOUND', detail);
  }
}

/** Raised at startup for invalid environment or policy settings. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR');
  }
}
