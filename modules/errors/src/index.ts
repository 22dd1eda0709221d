/**
 * Error taxonomy shared by every pipeline module.
 *
 * Expected staging outcomes (user not found, input blocked) are values and do
 * not live here.
 */

export type ErrorContext = Record<string, unknown>;

export class PipelineError extends Error {
  public code: string;
  public context?: ErrorContext;

  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = 'PIPELINE_ERROR';
    this.context = context;
  }
}

export class ConnectionError extends PipelineError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = 'ConnectionError';
    this.code = 'CONNECTION_ERROR';
  }
}

export type ExtractionFailureReason = 'navigation' | 'timeout' | 'aborted' | 'parse';

export class ExtractionError extends PipelineError {
  public reason: ExtractionFailureReason;

  constructor(message: string, reason: ExtractionFailureReason, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = 'ExtractionError';
    this.code = 'EXTRACTION_ERROR';
    this.reason = reason;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = 'ConfigError';
    this.code = 'CONFIG_ERROR';
  }
}

export class TemplateRenderError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'TemplateRenderError';
    this.code = 'TEMPLATE_RENDER_ERROR';
  }
}

export class StoreCorruptError extends PipelineError {
  constructor(message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = 'StoreCorruptError';
    this.code = 'STORE_CORRUPT_ERROR';
  }
}

export class StoreLockedError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'StoreLockedError';
    this.code = 'STORE_LOCKED_ERROR';
  }
}

export class UnknownUserError extends PipelineError {
  constructor(userId: string) {
    super(`unknown user: ${userId}`, { userId });
    this.name = 'UnknownUserError';
    this.code = 'UNKNOWN_USER_ERROR';
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
