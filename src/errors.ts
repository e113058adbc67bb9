// Failure taxonomy and recovery policy for a report run

import Logger, { getErrorMessage } from './logger';

export type FailureKind =
  | 'connection'
  | 'user-directory'
  | 'shared-access'
  | 'products'
  | 'lookup'
  | 'geography'
  | 'option-label';

export type RecoveryAction = 'abort-run' | 'abandon-node' | 'default-value';

/** What the run does when a call of each kind fails */
export const FAILURE_POLICY: Readonly<Record<FailureKind, RecoveryAction>> = {
  connection: 'abort-run',
  'user-directory': 'abort-run',
  'shared-access': 'abandon-node',
  products: 'abandon-node',
  lookup: 'default-value',
  geography: 'default-value',
  'option-label': 'default-value'
};

/** The record store could not be reached or authenticated against */
export class FatalConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalConnectionError';
  }
}

/** A single query or resolve call failed */
export class RecoverableFetchError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecoverableFetchError';
    this.kind = kind;
  }
}

/** Processing one seed user (or a node of its chain) failed; the rest of that chain is skipped */
export class RecoverableUserError extends Error {
  readonly userId: string;

  constructor(userId: string, userName: string, options?: { cause?: unknown }) {
    super(`Error processing user ${userName}: ${getErrorMessage(options?.cause)}`, options);
    this.name = 'RecoverableUserError';
    this.userId = userId;
  }
}

export type FetchResult<T> = { ok: true; value: T } | { ok: false; error: RecoverableFetchError };

/** Decide how the run reacts to an error escaping a node */
export function recoveryFor(error: unknown): RecoveryAction {
  if (error instanceof FatalConnectionError) return 'abort-run';
  if (error instanceof RecoverableFetchError) return FAILURE_POLICY[error.kind];
  return 'abandon-node';
}

/**
 * Run an external call and capture any rejection as a typed failure instead of throwing.
 * The failure's kind decides its recovery through FAILURE_POLICY.
 */
export async function attempt<T>(kind: FailureKind, label: string, fn: () => Promise<T>): Promise<FetchResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error: new RecoverableFetchError(kind, `${label}: ${getErrorMessage(error)}`, { cause: error }) };
  }
}

/** Value of a successful result, or the fallback after logging the failure */
export function valueOr<T>(result: FetchResult<T>, fallback: T): T {
  if (result.ok) return result.value;
  Logger.warn(`Error ${result.error.message}`);
  return fallback;
}

/** Value of a successful result; a failure is raised for the caller's policy to handle */
export function unwrap<T>(result: FetchResult<T>): T {
  if (result.ok) return result.value;
  throw result.error;
}
