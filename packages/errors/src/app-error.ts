export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  /** False for invariant violations that must stop the run. */
  isOperational?: boolean;
  details?: Record<string, unknown>;
  /** Underlying error from a provider, store or source. */
  cause?: unknown;
}

/**
 * Base of every error the pipeline raises on purpose. `statusCode` follows
 * HTTP conventions so error kinds can be classified uniformly.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor({ message, statusCode, code, isOperational = true, details, cause }: AppErrorOptions) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }

  /** Shape written to logs and job summaries. */
  toJSON(): { name: string; code: string; statusCode: number; message: string } {
    return { name: this.name, code: this.code, statusCode: this.statusCode, message: this.message };
  }
}
