import { z } from 'zod';

export interface AppErrorOptions {
  exitCode?: number;
  details?: unknown;
  cause?: unknown;
  isOperational?: boolean;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: unknown;
  public readonly isOperational: boolean;

  constructor(code: string, message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.exitCode = options.exitCode ?? 1;
    this.details = options.details;
    this.isOperational = options.isOperational ?? true; // false marks programming bugs
  }
}

/** Bad command-line arguments or environment. Exit code 2, like most CLIs. */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super('INVALID_CONFIG', message, { exitCode: 2, details });
  }
}

export class CodeFileError extends AppError {
  public readonly filePath: string;

  constructor(filePath: string, operation: 'read' | 'write', cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('CODE_FILE_IO', `Could not ${operation} ${filePath}: ${reason}`, { cause, details: { filePath, operation } });
    this.filePath = filePath;
  }
}

export interface ExhaustionDetails {
  prefix: string;
  minHammingDistance: number;
  attempts: number;
  usedCount: number;
}

/**
 * Raised only when a maximum attempt count is configured and every candidate
 * drawn for one code was rejected.
 */
export class CodeSpaceExhaustedError extends AppError {
  public readonly prefix: string;
  public readonly minHammingDistance: number;
  public readonly attempts: number;
  public readonly usedCount: number;

  constructor(details: ExhaustionDetails) {
    super(
      'CODE_SPACE_EXHAUSTED',
      `Gave up on prefix "${details.prefix}" after ${details.attempts} rejected candidates ` +
        `(minimum distance ${details.minHammingDistance}, ${details.usedCount} codes in use)`,
      { details }
    );
    this.prefix = details.prefix;
    this.minHammingDistance = details.minHammingDistance;
    this.attempts = details.attempts;
    this.usedCount = details.usedCount;
  }
}

export function formatZodIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('\n');
}

/** Normalises anything thrown into an AppError the CLI can report. */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;

  if (err instanceof z.ZodError) {
    return new ConfigError(formatZodIssues(err), err.issues);
  }

  const message = err instanceof Error ? err.message : String(err);
  return new AppError('INTERNAL_ERROR', message, { cause: err, isOperational: false });
}
