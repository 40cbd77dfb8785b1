export class AppError extends Error {
  constructor(message: string, readonly code: string = "APP_ERROR") {
    super(message);
    this.name = "AppError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class InvalidConfigError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_CONFIG");
    this.name = "InvalidConfigError";
  }
}

export class DuplicateNameError extends AppError {
  constructor(message: string) {
    super(message, "DUPLICATE_NAME");
    this.name = "DuplicateNameError";
  }
}

export class AlreadyRunningError extends AppError {
  constructor(message: string) {
    super(message, "ALREADY_RUNNING");
    this.name = "AlreadyRunningError";
  }
}

export class WorkerStartFailedError extends AppError {
  constructor(message: string) {
    super(message, "WORKER_START_FAILED");
    this.name = "WorkerStartFailedError";
  }
}

export class ShuttingDownError extends AppError {
  constructor(message: string) {
    super(message, "SHUTTING_DOWN");
    this.name = "ShuttingDownError";
  }
}

export function errorFromCode(code: string, message: string): AppError {
  switch (code) {
    case "NOT_FOUND":
      return new NotFoundError(message);
    case "INVALID_CONFIG":
      return new InvalidConfigError(message);
    case "DUPLICATE_NAME":
      return new DuplicateNameError(message);
    case "ALREADY_RUNNING":
      return new AlreadyRunningError(message);
    case "WORKER_START_FAILED":
      return new WorkerStartFailedError(message);
    case "SHUTTING_DOWN":
      return new ShuttingDownError(message);
    default:
      return new AppError(message, code);
  }
}

export function httpStatusForError(error: unknown): number {
  if (error instanceof InvalidConfigError) {
    return 400;
  }
  if (error instanceof NotFoundError) {
    return 404;
  }
  if (error instanceof DuplicateNameError || error instanceof AlreadyRunningError) {
    return 409;
  }
  if (error instanceof WorkerStartFailedError) {
    return 502;
  }
  if (error instanceof ShuttingDownError) {
    return 503;
  }
  return 500;
}
