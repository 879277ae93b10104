/**
 * Typed error model for machine-actionable error handling.
 *
 * Lifecycle failures are carried as typed values rather than bare exceptions,
 * so callers can tell which stage failed and whether retrying makes sense.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'TEMPLATE'
  | 'WORKSPACE'
  | 'PROVISION'
  | 'ASSET'
  | 'ARCHIVE'
  | 'UPLOAD'
  | 'RUN'
  | 'LIFECYCLE'
  | 'VALIDATION'
  | 'CONFIG'
  | 'SYSTEM';

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and events. */
export interface TypedError {
  /** Namespaced error code (e.g., "ASSET.FETCH_FAILED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated draft if applicable. */
  draftId?: string;
  /** Associated lifecycle run if applicable. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  draftId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    draftId: params.draftId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Thrown wrapper that carries a TypedError across async boundaries. */
export class LifecycleError extends Error {
  constructor(public typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.name = 'LifecycleError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** Type guard for LifecycleError with an optional code match. */
export function isLifecycleError(err: unknown, code?: string): err is LifecycleError {
  return err instanceof LifecycleError && (code === undefined || err.typedError.code === code);
}

/**
 * Anything shaped like an Error. Errors raised by Node's own modules fail
 * `instanceof Error` when the caller runs in another realm, such as a test VM.
 */
export function isErrorLike(err: unknown): err is { name: string; message: string; stack?: string } {
  return (
    typeof err === 'object' && err !== null &&
    'message' in err && typeof err.message === 'string' &&
    'name' in err && typeof err.name === 'string'
  );
}

/** Extract a message from anything caught. */
export function errorMessage(err: unknown): string {
  if (isErrorLike(err)) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

/**
 * Normalize anything caught into a TypedError.
 * LifecycleErrors pass through; aborts become cancellations; the rest is SYSTEM.INTERNAL.
 */
export function toTypedError(err: unknown, draftId?: string): TypedError {
  if (err instanceof LifecycleError) return err.typedError;
  if (isAbortError(err)) return canceledError(draftId);
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: errorMessage(err),
    draftId,
    retryable: false,
  });
}

/** Whether an error is an abort raised by an AbortSignal. */
export function isAbortError(err: unknown): boolean {
  if (isLifecycleError(err, 'RUN.CANCELED')) return true;
  return isErrorLike(err) && (err.name === 'AbortError' || err.name === 'CanceledError');
}

// --- Generic factories ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

// --- Lifecycle taxonomy ---

export function templateNotFoundError(templateName: string, available: string[]): TypedError {
  return createTypedError({
    code: 'TEMPLATE.NOT_FOUND',
    message: `Template not found: ${templateName}`,
    retryable: false,
    details: { templateName, available },
    suggestedFixes: [
      { type: 'USE_KNOWN_TEMPLATE', params: { available }, description: 'Use one of the configured template names' },
    ],
  });
}

export function workspaceAlreadyExistsError(draftId: string, path?: string): TypedError {
  return createTypedError({
    code: 'WORKSPACE.ALREADY_EXISTS',
    message: `A workspace for draft "${draftId}" already exists`,
    draftId,
    retryable: false,
    details: path ? { path } : undefined,
    suggestedFixes: [
      { type: 'WAIT_FOR_ACTIVE_RUN', params: { draftId }, description: 'Wait for the in-flight run for this draft to finish' },
    ],
  });
}

export function provisionIoError(draftId: string, cause: string): TypedError {
  return createTypedError({
    code: 'PROVISION.IO',
    message: `Failed to provision workspace for draft "${draftId}": ${cause}`,
    draftId,
    retryable: false,
    details: { cause },
    suggestedFixes: [
      { type: 'CHECK_DISK', params: {}, description: 'Check free space and permissions on the working root' },
    ],
  });
}

export function integrityError(locator: string, expectedBytes: number, actualBytes: number): TypedError {
  return createTypedError({
    code: 'ASSET.INTEGRITY',
    message: `Downloaded ${actualBytes} bytes from ${locator}, expected ${expectedBytes}`,
    retryable: true,
    details: { locator, expectedBytes, actualBytes },
  });
}

/** One failed transfer attempt. Retryable unless the source rejected the request outright. */
export function assetTransferError(
  locator: string,
  message: string,
  retryable: boolean,
  statusCode?: number,
): TypedError {
  return createTypedError({
    code: 'ASSET.TRANSFER',
    message,
    retryable,
    details: statusCode === undefined ? { locator } : { locator, statusCode },
  });
}

export function assetFetchError(
  locator: string,
  attempts: number,
  cause: TypedError,
  draftId?: string,
): TypedError {
  return createTypedError({
    code: 'ASSET.FETCH_FAILED',
    message: `Failed to fetch ${locator} after ${attempts} attempt(s): ${cause.message}`,
    draftId,
    retryable: false,
    details: { locator, attempts, cause },
  });
}

/** Aggregate per-asset failures into the run-level fetch error. */
export function aggregateAssetFetchError(draftId: string, failures: TypedError[]): TypedError {
  const first = failures[0];
  const message = failures.length === 1 && first
    ? first.message
    : `${failures.length} assets failed to download`;
  return createTypedError({
    code: 'ASSET.FETCH_FAILED',
    message,
    draftId,
    retryable: false,
    details: { failures },
  });
}

export function workspaceNotReadyError(draftId: string, reason: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'WORKSPACE.NOT_READY',
    message: `Workspace for draft "${draftId}" is not ready: ${reason}`,
    draftId,
    retryable: false,
    details,
  });
}

export function archiveError(draftId: string, cause: string): TypedError {
  return createTypedError({
    code: 'ARCHIVE.IO',
    message: `Failed to archive draft "${draftId}": ${cause}`,
    draftId,
    retryable: false,
    details: { cause },
  });
}

export type UploadErrorKind = 'transient' | 'permanent';

export function uploadError(
  draftId: string,
  key: string,
  kind: UploadErrorKind,
  cause: string,
  attempts: number,
  statusCode?: number,
): TypedError {
  const fixes: SuggestedFix[] = kind === 'permanent'
    ? [{ type: 'CHECK_CREDENTIALS', params: { statusCode }, description: 'Verify storage credentials and bucket permissions' }]
    : [{ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 }, description: 'Storage was unavailable. Retry the run later.' }];
  return createTypedError({
    code: kind === 'transient' ? 'UPLOAD.TRANSIENT' : 'UPLOAD.PERMANENT',
    message: `Failed to upload ${key}: ${cause}`,
    draftId,
    retryable: kind === 'transient',
    details: { key, kind, attempts, statusCode },
    suggestedFixes: fixes,
  });
}

export function canceledError(draftId?: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    draftId,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

export function invalidTransitionError(from: string, to: string, validTargets: string[]): TypedError {
  return createTypedError({
    code: 'LIFECYCLE.INVALID_TRANSITION',
    message: `Invalid lifecycle transition: ${from} -> ${to}`,
    retryable: false,
    details: { from, to, validTargets },
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace each occurrence of the given secrets in a message with its masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join sidesteps regex escaping
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
