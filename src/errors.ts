/**
 * Error taxonomy for recoverable navigator failures
 */

export type NavigatorErrorCode =
  | 'NotFound'
  | 'AccessDenied'
  | 'NotADirectory'
  | 'DecodeFailure'
  | 'IoFailure'
  | 'PersistenceFailure';

export class NavigatorError extends Error {
  readonly code: NavigatorErrorCode;
  readonly path?: string;

  constructor(code: NavigatorErrorCode, message: string, options?: { path?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'NavigatorError';
    this.code = code;
    this.path = options?.path;
  }
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = (error as NodeJS.ErrnoException).code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Map a Node.js filesystem error onto the navigator taxonomy
 */
export function toNavigatorError(error: unknown, path?: string): NavigatorError {
  if (error instanceof NavigatorError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  switch (errnoCode(error)) {
    case 'ENOENT':
      return new NavigatorError('NotFound', message, { path, cause: error });
    case 'EACCES':
    case 'EPERM':
      return new NavigatorError('AccessDenied', message, { path, cause: error });
    case 'ENOTDIR':
      return new NavigatorError('NotADirectory', message, { path, cause: error });
    default:
      return new NavigatorError('IoFailure', message, { path, cause: error });
  }
}

const SUMMARIES: Record<NavigatorErrorCode, string> = {
  NotFound: 'No longer exists',
  AccessDenied: 'Permission denied',
  NotADirectory: 'Not a directory',
  DecodeFailure: 'Could not decode',
  IoFailure: 'Read error',
  PersistenceFailure: 'History not saved'
};

/**
 * One-line message for the status bar
 */
export function describeError(error: unknown): string {
  const navigatorError = toNavigatorError(error);
  const summary = SUMMARIES[navigatorError.code];
  return navigatorError.path ? `${summary}: ${navigatorError.path}` : summary;
}
