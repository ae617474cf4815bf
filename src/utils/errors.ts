/**
 * Missing or malformed configuration. Raised before any remote call.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * The remote store could not be reached (network, proxy, timeout, auth).
 */
export class TransportError extends Error {
  readonly transient: boolean;

  constructor(message: string, options: ErrorOptions & { transient?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.transient = options.transient ?? false;
  }
}

/**
 * The input workbook does not have the expected layout or content.
 */
export class FormatError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = 'FormatError';
    this.details = details;
  }
}

/**
 * The remote store rejected a single item request.
 */
export class RemoteError extends Error {
  readonly status?: number;
  readonly transient: boolean;

  constructor(message: string, options: ErrorOptions & { status?: number; transient?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = 'RemoteError';
    this.status = options.status;
    this.transient = options.transient ?? false;
  }
}

export class NotFoundError extends RemoteError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, { ...options, status: 404 });
    this.name = 'NotFoundError';
  }
}

/**
 * A non-fatal problem found while mapping data. Logged, never thrown.
 */
export class ValidationWarning {
  constructor(
    readonly message: string,
    readonly context: { itemId?: number; sequence?: string } = {},
  ) {}

  toString(): string {
    const where = [
      this.context.itemId !== undefined ? `ID=${this.context.itemId}` : '',
      this.context.sequence ? `seq=${this.context.sequence}` : '',
    ].filter(Boolean).join(', ');
    return where ? `${this.message} (${where})` : this.message;
  }
}

export function isTransientError(err: unknown): boolean {
  return (err instanceof TransportError || err instanceof RemoteError) && err.transient;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Message plus the chain of causes, one per line
 */
export function describeError(err: unknown): string {
  const lines = [errorMessage(err)];
  let cause = err instanceof Error ? err.cause : undefined;
  while (cause !== undefined) {
    lines.push(`  caused by: ${errorMessage(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return lines.join('\n');
}
