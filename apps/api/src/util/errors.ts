export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AppError";
    Error.captureStackTrace(this, this.constructor);
  }
}

// k, L0 or methane content outside its hard domain
export class ParameterError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_PARAMETER", message, 400, details);
    this.name = "ParameterError";
  }
}

export class InputShapeError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_INPUT", message, 400, details);
    this.name = "InputShapeError";
  }
}

export class LookupError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NOT_FOUND", message, 404, details);
    this.name = "LookupError";
  }
}
