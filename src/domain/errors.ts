/**
 * Typed error model.
 *
 * Errors are carried as values on run, job and step records rather than
 * thrown across job boundaries, so a failing matrix entry can never take
 * down its siblings. Codes are namespaced by the failure category:
 *
 * - SOURCE.*     source acquisition (checkout)
 * - PROVISION.*  interpreter provisioning
 * - TEST.*       test execution
 * - ARTIFACT.*   archival
 * - STEP.*       step-level failures common to every action (timeout, missing handler)
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'SOURCE'
  | 'PROVISION'
  | 'TEST'
  | 'ARTIFACT'
  | 'STEP'
  | 'JOB'
  | 'RUN'
  | 'RUNNER'
  | 'WORKFLOW'
  | 'TRIGGER'
  | 'VALIDATION'
  | 'AUTH'
  | 'SYSTEM';

/** Typed suggested fix a caller can act on. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and events. */
export interface TypedError {
  /** Namespaced error code (e.g., "STEP.TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  runId?: string;
  jobRunId?: string;
  /** Zero-based index of the step within its job. */
  stepIndex?: number;
  /**
   * Whether the same operation is expected to succeed without changes.
   * Informational only: nothing in the engine retries.
   */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  runId?: string;
  jobRunId?: string;
  stepIndex?: number;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    runId: params.runId,
    jobRunId: params.jobRunId,
    stepIndex: params.stepIndex,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Domain prefix of an error code ("STEP.TIMEOUT" -> "STEP"). */
export function errorDomain(error: TypedError): string {
  const dot = error.code.indexOf('.');
  return dot === -1 ? error.code : error.code.slice(0, dot);
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function authError(message: string): TypedError {
  return createTypedError({
    code: 'AUTH.INVALID_SIGNATURE',
    message,
    retryable: false,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function workflowCompilationError(message: string, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'WORKFLOW.COMPILATION',
    message,
    retryable: false,
    suggestedFixes: fixes,
  });
}

export function stepTimeoutError(stepIndex: number, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'STEP.TIMEOUT',
    message: `Step exceeded its timeout of ${formatMinutes(timeoutMs)} minutes`,
    stepIndex,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMinutes: Math.ceil((timeoutMs * 1.5) / 60_000) } },
      { type: 'REDUCE_SCOPE', params: {} },
    ],
  });
}

export function jobTimeoutError(jobRunId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'JOB.TIMEOUT',
    message: `Job exceeded its timeout of ${formatMinutes(timeoutMs)} minutes`,
    jobRunId,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMinutes: Math.ceil((timeoutMs * 1.5) / 60_000) } },
    ],
  });
}

export function jobCanceledError(jobRunId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'JOB.CANCELED',
    message: reason ? `Job canceled: ${reason}` : 'Job canceled',
    jobRunId,
    retryable: false,
  });
}

export function stepCanceledError(stepIndex: number, reason?: string): TypedError {
  return createTypedError({
    code: 'STEP.CANCELED',
    message: reason ? `Step canceled: ${reason}` : 'Step canceled',
    stepIndex,
    retryable: false,
  });
}

export function noHandlerError(stepIndex: number, action: string): TypedError {
  return createTypedError({
    code: 'STEP.NO_HANDLER',
    message: `No handler registered for action "${action}". Register one with registerActionHandler() before running this workflow.`,
    stepIndex,
    retryable: false,
    suggestedFixes: [
      { type: 'REGISTER_HANDLER', params: { action }, description: `Register an action handler for "${action}"` },
    ],
  });
}

export function runnerUnavailableError(label: string, available: string[]): TypedError {
  return createTypedError({
    code: 'RUNNER.UNAVAILABLE',
    message: `No runner serves the label "${label}"`,
    retryable: false,
    details: { label, available },
    suggestedFixes: [
      { type: 'USE_LABEL', params: { labels: available }, description: 'Use one of the configured runner labels' },
    ],
  });
}

export function triggerNotMatchedError(workflowName: string, event: string): TypedError {
  return createTypedError({
    code: 'TRIGGER.NOT_MATCHED',
    message: `Workflow "${workflowName}" is not triggered by "${event}" events`,
    retryable: false,
    details: { event },
  });
}

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
    retryable: false,
  });
}

export function runAlreadyRunningError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.ALREADY_RUNNING',
    message: `Run "${runId}" is already being executed`,
    runId,
    retryable: false,
  });
}

export function runCanceledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    runId,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

export function runInvalidStateTransition(runId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'RUN.INVALID_STATE_TRANSITION',
    message: `Cannot transition run from "${from}" to "${to}"`,
    runId,
    retryable: false,
    details: { from, to },
  });
}

export function configError(variable: string, value: string, expected: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.CONFIG',
    message: `Invalid value for ${variable}: "${value}" (expected ${expected})`,
    retryable: false,
    details: { variable, value },
  });
}

function formatMinutes(ms: number): string {
  return String(Number((ms / 60_000).toFixed(3)));
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
