export class UpstreamFetchError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'UpstreamFetchError';
    this.status = options.status;
  }
}

export class ConstraintViolationError extends Error {
  constructor(readonly externalId: number) {
    super(`Listing with external id ${externalId} already exists`);
    this.name = 'ConstraintViolationError';
  }
}

export class NotFoundError extends Error {
  constructor(message = 'Not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
