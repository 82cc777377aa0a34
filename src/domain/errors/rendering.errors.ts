export class RenderingError extends Error {
  constructor(
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'RenderingError';
  }
}

export class TemplateNotFoundError extends RenderingError {
  constructor(
    readonly templatePath: string,
    cause?: unknown,
  ) {
    super(`LaTeX template file not found: ${templatePath}`, cause);
    this.name = 'TemplateNotFoundError';
  }
}

export class ResumeParseError extends RenderingError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ResumeParseError';
  }
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
