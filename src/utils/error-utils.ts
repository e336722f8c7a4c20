/**
 * Error types and helpers shared by the subscription pipeline
 */

export interface ErrorLike {
  message?: unknown;
  name?: unknown;
  [key: string]: unknown;
}

export function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null;
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Raised when a lock, scheduler or host is used after disposal.
 */
export class ObjectDisposedError extends Error {
  constructor(readonly objectName: string) {
    super(`${objectName} has been disposed`);
    this.name = 'ObjectDisposedError';
  }
}

/**
 * Raised when work scoped to a loaded project is requested after unload began.
 */
export class ProjectUnloadedError extends Error {
  constructor(readonly projectPath: string) {
    super(`Project ${projectPath} is unloading`);
    this.name = 'ProjectUnloadedError';
  }
}

export class ManifestValidationError extends Error {
  constructor(readonly manifestPath: string, readonly issues: string[]) {
    super(`Invalid manifest ${manifestPath}: ${issues.join('; ')}`);
    this.name = 'ManifestValidationError';
  }
}

/**
 * Cancellation is a normal outcome (project unload, superseded work), never a failure.
 */
export function isCancellationError(error: unknown): boolean {
  if (error instanceof ProjectUnloadedError || error instanceof ObjectDisposedError) {
    return true;
  }
  return isErrorLike(error) && error.name === 'AbortError';
}
