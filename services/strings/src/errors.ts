/** Error codes reported back to clients in the `error` field of a failure body. */
export type ErrorCode = 'invalid_input' | 'unparsable_query' | 'conflict' | 'not_found';

/** Base class for failures that map directly onto an HTTP status. */
export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly code: ErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string, code: ErrorCode = 'invalid_input') {
    super(message, 400, code);
  }
}

/** Raised when no natural-language heuristic recognised anything in the query. */
export class UnparsableQueryError extends InvalidInputError {
  constructor(message = 'Unable to parse natural language query') {
    super(message, 'unparsable_query');
  }
}

export class ConflictError extends AppError {
  constructor(message = 'String already exists') {
    super(message, 409, 'conflict');
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'String not found') {
    super(message, 404, 'not_found');
  }
}
