export interface ErrorIssue {
  path: string;
  message: string;
}

export type UpstreamStage = 'reasoning' | 'research';

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly errorCode: string,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }

  toResponse(): Record<string, unknown> {
    return { error: this.errorCode, message: this.message };
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly issues: ErrorIssue[] = [],
  ) {
    super(400, 'validation_error', message);
    this.name = 'ValidationError';
  }

  override toResponse(): Record<string, unknown> {
    return { ...super.toResponse(), issues: this.issues };
  }
}

export class UpstreamError extends AppError {
  constructor(
    public readonly stage: UpstreamStage,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(503, 'upstream_error', message);
    this.name = 'UpstreamError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  override toResponse(): Record<string, unknown> {
    return { ...super.toResponse(), stage: this.stage };
  }
}

export class InternalError extends AppError {
  constructor(message: string) {
    super(500, 'internal_error', message);
    this.name = 'InternalError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'not_found', message);
    this.name = 'NotFoundError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
