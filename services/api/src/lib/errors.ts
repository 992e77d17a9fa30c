export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode = 500, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
  }
}

/** An edit whose positions or text disagree with the documents it claims to come from. */
export class MalformedEditError extends AppError {
  constructor(index: number, reason: string) {
    super(`edit #${index} is malformed: ${reason}`, "MALFORMED_EDIT", 422, { index, reason });
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "BAD_REQUEST", 400, context);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super(identifier ? `${resource} '${identifier}' not found` : `${resource} not found`, "NOT_FOUND", 404, {
      resource,
      identifier
    });
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
