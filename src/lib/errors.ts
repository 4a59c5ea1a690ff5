/**
 * Domain errors raised by persistence, access checks and agent runs.
 * Route handlers turn them into HTTP responses via `errorResponse`; the
 * streaming path turns them into `error` chunks.
 */

export type ErrorCode =
  | "THREAD_NOT_FOUND"
  | "PERMISSION_DENIED"
  | "AGENT_TYPE_UNSUPPORTED"
  | "RECORD_CREATION_FAILED"
  | "EMPTY_RESPONSE"
  | "FORMAT_ERROR"
  | "VALIDATION_ERROR";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code: ErrorCode,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ThreadNotFoundError extends AppError {
  constructor(threadId: string, message = `Thread with ID ${threadId} not found`) {
    super(404, message, "THREAD_NOT_FOUND");
    this.name = "ThreadNotFoundError";
  }
}

export class ThreadPermissionError extends AppError {
  constructor(
    userId: string,
    threadId: string,
    message = `User with ID ${userId} does not have permission to access thread with ID ${threadId}`,
  ) {
    super(403, message, "PERMISSION_DENIED");
    this.name = "ThreadPermissionError";
  }
}

export class AgentTypeError extends AppError {
  constructor(message = "Thread must have a valid agent_type") {
    super(400, message, "AGENT_TYPE_UNSUPPORTED");
    this.name = "AgentTypeError";
  }
}

export class RecordCreationError extends AppError {
  constructor(message = "Failed to create record") {
    super(400, message, "RECORD_CREATION_FAILED");
    this.name = "RecordCreationError";
  }
}

export class EmptyResponseError extends AppError {
  constructor(message = "Failed to generate agent response") {
    super(422, message, "EMPTY_RESPONSE");
    this.name = "EmptyResponseError";
  }
}

export class ModelResponseFormatError extends AppError {
  constructor(message = "The model response has an incorrect format") {
    super(422, message, "FORMAT_ERROR");
    this.name = "ModelResponseFormatError";
  }
}

export class ValidationError extends AppError {
  constructor(message = "Invalid request") {
    super(422, message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
