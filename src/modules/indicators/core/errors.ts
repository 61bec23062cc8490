/**
 * Domain errors for the indicator audit module.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Registry Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface NetworkError {
  readonly type: 'NetworkError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

export interface TimeoutError {
  readonly type: 'TimeoutError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

export interface HttpError {
  readonly type: 'HttpError';
  readonly message: string;
  readonly status: number;
  readonly url: string;
}

export interface InvalidResponseError {
  readonly type: 'InvalidResponseError';
  readonly message: string;
  readonly details: string[];
}

export type RegistryError = NetworkError | TimeoutError | HttpError | InvalidResponseError;

// ─────────────────────────────────────────────────────────────────────────────
// Group Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface GroupNotFoundError {
  readonly type: 'GroupNotFoundError';
  readonly message: string;
  readonly groupId: string;
}

export interface InvalidGroupError {
  readonly type: 'InvalidGroupError';
  readonly message: string;
  readonly groupId: string;
}

export type GroupScanError = RegistryError | GroupNotFoundError | InvalidGroupError;

export interface InvalidGroupPatternError {
  readonly type: 'InvalidGroupPatternError';
  readonly message: string;
  readonly pattern: string;
}

export type GroupSelectionError = RegistryError | InvalidGroupPatternError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createNetworkError = (message: string, cause?: unknown): NetworkError => ({
  type: 'NetworkError',
  message,
  retryable: true,
  cause,
});

export const createTimeoutError = (message: string, cause?: unknown): TimeoutError => ({
  type: 'TimeoutError',
  message,
  retryable: true,
  cause,
});

export const createHttpError = (url: string, status: number): HttpError => ({
  type: 'HttpError',
  message: `Registry request to ${url} failed with status ${String(status)}`,
  status,
  url,
});

export const createInvalidResponseError = (
  message: string,
  details: string[] = []
): InvalidResponseError => ({
  type: 'InvalidResponseError',
  message,
  details,
});

export const createGroupNotFoundError = (groupId: string): GroupNotFoundError => ({
  type: 'GroupNotFoundError',
  message: `Group id ${groupId} not found in registry`,
  groupId,
});

export const createInvalidGroupError = (groupId: string, reason: string): InvalidGroupError => ({
  type: 'InvalidGroupError',
  message: `Group id ${groupId} does not have valid metadata: ${reason}`,
  groupId,
});

export const createInvalidGroupPatternError = (
  pattern: string,
  cause: unknown
): InvalidGroupPatternError => ({
  type: 'InvalidGroupPatternError',
  message: `Invalid group description pattern ${pattern}: ${getErrorMessage(cause)}`,
  pattern,
});

/**
 * Whether `cause` is an abort raised by a request timeout signal (a DOMException).
 */
export const isTimeoutError = (cause: unknown): boolean => {
  if (typeof cause === 'object' && cause !== null && 'name' in cause) {
    return cause.name === 'TimeoutError' || cause.name === 'AbortError';
  }
  return false;
};

/**
 * Message of an arbitrary thrown value or error object.
 */
export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return String(error);
};
