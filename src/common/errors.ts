/**
 * Application errors
 *
 * Every error carries a machine-readable code and the HTTP status the
 * global Fastify error handler answers with.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_ERROR', message, 400);
    this.issues = issues;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class EngineNotReadyError extends AppError {
  constructor(message = 'No trained engine instance is loaded') {
    super('ENGINE_NOT_READY', message, 503);
  }
}

export class TrainingError extends AppError {
  constructor(message: string) {
    super('TRAINING_FAILED', message, 500);
  }
}

export class ModelLoadError extends AppError {
  constructor(message: string) {
    super('MODEL_LOAD_FAILED', message, 500);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
