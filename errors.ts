export type ErrorCode =
  | 'CONFIG'
  | 'NOT_FOUND'
  | 'VALIDATION'
  | 'UPSTREAM'
  | 'AUTH'
  | 'FILESYSTEM'
  | 'TRANSIENT_LOOP';

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing path or credential; the job never starts. */
export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

/** A failure envelope from the remote API that is not otherwise classified. */
export class UpstreamError extends AppError {
  readonly errno?: number;

  constructor(message: string, errno?: number) {
    super('UPSTREAM', message);
    this.errno = errno;
  }
}

/** Credential rejected. Never retried. */
export class AuthError extends AppError {
  constructor(message: string) {
    super('AUTH', message);
  }
}

export class FilesystemError extends AppError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('FILESYSTEM', `${path}: ${errorMessage(cause)}`, { cause });
    this.path = path;
  }
}

export class TransientLoopError extends AppError {
  constructor(cause: unknown) {
    super('TRANSIENT_LOOP', errorMessage(cause), { cause });
  }
}

export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
};

/** Errors that abort a whole job instead of a single item. */
export const isFatal = (err: unknown): boolean =>
  err instanceof ConfigError || err instanceof AuthError;
