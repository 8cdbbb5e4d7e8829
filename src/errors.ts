export type ErrorKind = 'conflict' | 'unauthenticated' | 'forbidden' | 'not_found' | 'validation';

export const statusByKind: Record<ErrorKind, number> = {
  conflict: 400,
  unauthenticated: 401,
  forbidden: 403,
  not_found: 404,
  validation: 422,
};

export class AppError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }

  get status(): number {
    return statusByKind[this.kind];
  }
}

export const conflict = (message: string) => new AppError('conflict', message);
export const unauthenticated = (message = 'Could not validate credentials') =>
  new AppError('unauthenticated', message);
export const forbidden = (message = 'Access denied') => new AppError('forbidden', message);
export const notFound = (message: string) => new AppError('not_found', message);

/**
 * better-sqlite3 reports constraint failures through `code`; drizzle may wrap
 * the driver error, so the cause chain is walked as well.
 */
export function uniqueViolation(err: unknown): { column: string } | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    const code = 'code' in current ? current.code : undefined;
    if (code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
      const match = /UNIQUE constraint failed: \w+\.(\w+)/.exec(current.message);
      return { column: match ? match[1] : 'unknown' };
    }
    current = current.cause;
  }
  return undefined;
}
