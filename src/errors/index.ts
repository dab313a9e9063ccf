// Application errors
// Every failure the coordinator reasons about carries a string code

export type ErrorCode =
  | 'TRANSIENT'
  | 'HARD_LIMIT'
  | 'SAFETY_PROBE_FAILED'
  | 'WORKER_FATAL'
  | 'MANIFEST_CORRUPT'
  | 'INVALID_WORK_UNITS'
  | 'INVALID_CONFIG'
  | 'INVALID_INDEX'
  | 'CANCELLED';

/**
 * Base error with a machine-readable code
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
  }

  isCancellation(): boolean {
    return this.code === 'CANCELLED';
  }
}

/**
 * Network/timeout failure on a single unit. Safe to retry.
 */
export class RetriableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSIENT', message, undefined, options);
    this.name = 'RetriableError';
  }
}

/**
 * The remote refused the request because the session quota is spent.
 * Not a failure: the session needs a checkpoint before it can continue.
 */
export class HardLimitError extends AppError {
  constructor(message = 'Remote request limit reached', options?: { cause?: unknown }) {
    super('HARD_LIMIT', message, undefined, options);
    this.name = 'HardLimitError';
  }
}

const TRANSIENT_NODE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function hasStringCode(error: unknown): error is { code: string } {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

/**
 * Transient errors: our own RetriableError, Node socket errors, fetch timeouts
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof RetriableError) return true;
  if (error instanceof AppError) return false;
  if (error instanceof Error && error.name === 'TimeoutError') return true;
  return hasStringCode(error) && TRANSIENT_NODE_CODES.has(error.code);
}

export function isHardLimitError(error: unknown): error is HardLimitError {
  return error instanceof HardLimitError;
}

export function isCancellationError(error: unknown): boolean {
  if (error instanceof AppError) return error.isCancellation();
  return error instanceof Error && error.name === 'AbortError';
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

// ========== Factories ==========

export function cancelledError(message = 'Operation cancelled'): AppError {
  return new AppError('CANCELLED', message);
}

export function manifestCorruptionError(path: string, reason: string, cause?: unknown): AppError {
  return new AppError(
    'MANIFEST_CORRUPT',
    `Manifest at ${path} is unreadable or inconsistent: ${reason}. Start a fresh run to discard it.`,
    { path, reason },
    { cause },
  );
}

export function safetyProbeError(reason: string): AppError {
  return new AppError('SAFETY_PROBE_FAILED', reason);
}

export function workerFatalError(workerId: number, cause: unknown): AppError {
  return new AppError(
    'WORKER_FATAL',
    `Worker #${workerId} stopped: ${getErrorMessage(cause)}`,
    { workerId },
    { cause },
  );
}

export function invalidWorkUnitsError(reason: string): AppError {
  return new AppError('INVALID_WORK_UNITS', `Invalid work units: ${reason}`);
}

export function invalidConfigError(reason: string): AppError {
  return new AppError('INVALID_CONFIG', `Invalid configuration: ${reason}`);
}

export function invalidIndexError(index: number, totalUnits: number): AppError {
  return new AppError('INVALID_INDEX', `Unit index ${index} is outside 0..${totalUnits - 1}`, { index, totalUnits });
}
