/**
 * Application error types.
 *
 * Services throw these; the server's error handler turns them into
 * `{ error, message, fieldErrors? }` responses with the matching status code.
 */

export type FieldErrors = Record<string, string[]>;

/** Key used for errors that do not belong to a single field */
export const NON_FIELD_ERRORS = '__all__';

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  public readonly fieldErrors: FieldErrors;

  constructor(fieldErrors: FieldErrors, message = 'Validation failed') {
    super(400, 'Bad Request', message);
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] }, message);
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication required') {
    super(401, 'Unauthorized', message);
    this.name = 'AuthenticationError';
  }
}

export class PermissionDeniedError extends AppError {
  constructor(message = "You don't have permission to access this page.") {
    super(403, 'Forbidden', message);
    this.name = 'PermissionDeniedError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: number | string) {
    super(404, 'Not Found', id === undefined ? `${resource} not found` : `${resource} ${id} not found`);
    this.name = 'NotFoundError';
  }

  static withMessage(message: string): NotFoundError {
    const error = new NotFoundError('Resource');
    error.message = message;
    return error;
  }
}

/**
 * Collects field errors during multi-rule validation, then throws once
 */
export class FieldErrorCollector {
  private readonly errors: FieldErrors = {};

  add(field: string, message: string): void {
    (this.errors[field] ??= []).push(message);
  }

  has(field?: string): boolean {
    return field === undefined ? Object.keys(this.errors).length > 0 : field in this.errors;
  }

  throwIfAny(): void {
    if (this.has()) {
      const first = Object.values(this.errors)[0]?.[0] ?? 'Validation failed';
      throw new ValidationError({ ...this.errors }, first);
    }
  }
}
