/**
 * Error types for notezim.
 *
 * Configuration errors are fatal and abort the run before any note is touched.
 * Everything else is scoped to a single note: the orchestrator logs it, counts
 * the note as failed and moves on.
 */

export interface NotezimErrorOptions {
  code?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class NotezimError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, options?: NotezimErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.code = options?.code ?? 'NOTEZIM_ERROR';
    this.context = options?.context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/** Missing directories, unusable converter, invalid settings. */
export class ConfigurationError extends NotezimError {
  constructor(message: string, options?: Omit<NotezimErrorOptions, 'code'>) {
    super(message, { ...options, code: 'CONFIG_ERROR' });
  }
}

/** Malformed front matter. Recovered locally with empty metadata. */
export class FrontMatterError extends NotezimError {
  constructor(message: string, options?: Omit<NotezimErrorOptions, 'code'>) {
    super(message, { ...options, code: 'FRONT_MATTER_ERROR' });
  }
}

/** The external converter could not be run or reported failure. */
export class ConversionError extends NotezimError {
  public readonly stderr?: string;
  public readonly exitCode?: number | null;

  constructor(
    message: string,
    options?: Omit<NotezimErrorOptions, 'code'> & { stderr?: string; exitCode?: number | null; unavailable?: boolean }
  ) {
    super(message, { ...options, code: options?.unavailable ? 'CONVERTER_UNAVAILABLE' : 'CONVERSION_ERROR' });
    this.stderr = options?.stderr;
    this.exitCode = options?.exitCode;
  }

  get unavailable(): boolean {
    return this.code === 'CONVERTER_UNAVAILABLE';
  }
}

/** Writing a managed page or journal page failed. */
export class PageWriteError extends NotezimError {
  constructor(message: string, options?: Omit<NotezimErrorOptions, 'code'>) {
    super(message, { ...options, code: 'PAGE_WRITE_ERROR' });
  }
}

export function isNotezimError(error: unknown): error is NotezimError {
  return error instanceof NotezimError;
}

/** Extract a printable message from anything thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
