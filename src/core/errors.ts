/**
 * Error taxonomy shared by the control-plane client, the resource providers and
 * the cluster uninstaller.
 */

/** A compensating action that failed while rolling back a partial operation. */
export interface CleanupFailure {
  description: string;
  error: unknown;
}

export class ByocError extends Error {
  /** Rollback failures recorded against this error. They never replace it. */
  readonly cleanupFailures: CleanupFailure[] = [];

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Renders a response body for an error message. */
export function describeBody(body: unknown): string {
  if (typeof body === 'string') return body;
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}

/**
 * Non-retryable HTTP failure (4xx, or a redirect). Indicates a caller or
 * configuration mistake.
 */
export class ControlPlaneApiError extends ByocError {
  constructor(
    readonly status: number,
    readonly body: unknown,
    readonly method: string,
    readonly url: string,
  ) {
    super(`${method} ${url} failed with ${status}: ${describeBody(body)}`);
  }
}

/** 5xx response that persisted through every retry. */
export class ControlPlaneInternalError extends ByocError {
  constructor(
    readonly status: number,
    readonly body: unknown,
    readonly method: string,
    readonly url: string,
    readonly attempts: number,
  ) {
    super(`${method} ${url} failed with ${status} after ${attempts} attempt(s): ${describeBody(body)}`);
  }
}

/** The request never produced an HTTP response. */
export class ControlPlaneNetworkError extends ByocError {
  constructor(
    readonly method: string,
    readonly url: string,
    cause: unknown,
  ) {
    super(`${method} ${url} failed before a response was received: ${errorMessage(cause)}`, { cause });
  }
}

/** A 2xx response whose body does not have the expected shape. */
export class ControlPlaneResponseError extends ByocError {
  constructor(
    readonly operation: string,
    readonly body: unknown,
    readonly issues: string[],
  ) {
    super(`invalid response from ${operation}: ${issues.join('; ')}`);
  }
}

export class UninstallError extends ByocError {}

const REMEDIATION = "Run 'pulumi destroy' again to retry.";

export class UninstallJobFailedError extends UninstallError {
  constructor(
    readonly jobName: string,
    readonly logs: string,
  ) {
    super(`Uninstall job ${jobName} failed. ${REMEDIATION}\nLogs:\n${logs}`);
  }
}

/** The job never reached a terminal state; check cluster health rather than job logs. */
export class UninstallTimeoutError extends UninstallError {
  constructor(
    readonly jobName: string,
    readonly timeoutSeconds: number,
  ) {
    super(`Uninstall job ${jobName} timed out after ${timeoutSeconds}s. ${REMEDIATION}`);
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof ControlPlaneApiError && error.status === 404;
}

export function isRetryable(error: unknown): boolean {
  return error instanceof ControlPlaneInternalError;
}

export function isContractError(error: unknown): boolean {
  return error instanceof ControlPlaneApiError || error instanceof ControlPlaneResponseError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
