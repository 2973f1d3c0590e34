// =============================================================================
// Fatal error taxonomy. Everything per-item (one unreadable file, one unresolved
// reference, one cycle) is data in a result payload instead.
// =============================================================================

export const ERROR_KINDS = ['NotFound', 'IOError', 'InvalidArgument'] as const;
export type ErrorKind = (typeof ERROR_KINDS)[number];

export class AtlasError extends Error {
  public readonly kind: ErrorKind;
  public override readonly cause?: unknown;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message);
    this.kind = kind;
    this.cause = cause;
    this.name = 'AtlasError';
  }

  toJSON(): { kind: ErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

export class NotFoundError extends AtlasError {
  constructor(message: string, cause?: unknown) {
    super('NotFound', message, cause);
    this.name = 'NotFoundError';
  }
}

export class ScanIOError extends AtlasError {
  public readonly path: string;

  constructor(filePath: string, cause?: unknown) {
    super('IOError', `Cannot read ${filePath}: ${describeCause(cause)}`, cause);
    this.path = filePath;
    this.name = 'ScanIOError';
  }
}

export class InvalidArgumentError extends AtlasError {
  constructor(message: string, cause?: unknown) {
    super('InvalidArgument', message, cause);
    this.name = 'InvalidArgumentError';
  }
}

export function isAtlasError(err: unknown): err is AtlasError {
  return err instanceof AtlasError;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
