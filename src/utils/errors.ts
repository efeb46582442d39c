export type PipelineErrorKind =
  | 'connectivity'
  | 'auth'
  | 'fetch'
  | 'transform'
  | 'persistence'
  | 'reconciliation';

/**
 * Base class for every failure a pipeline stage can report.
 * The orchestrator maps stages, not error kinds, to exit points.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Database or upstream host unreachable */
export class ConnectivityError extends PipelineError {
  readonly kind = 'connectivity';
}

/** Credential exchange failed */
export class AuthError extends PipelineError {
  readonly kind = 'auth';
}

/** Listing retrieval failed */
export class FetchError extends PipelineError {
  readonly kind = 'fetch';
  readonly status: number | undefined;
  readonly url: string | undefined;

  constructor(
    message: string,
    options?: { cause?: unknown; status?: number; url?: string }
  ) {
    super(message, options);
    this.status = options?.status;
    this.url = options?.url;
  }
}

/** Raw listing did not have the expected shape */
export class TransformError extends PipelineError {
  readonly kind = 'transform';
}

/** Upsert or write-back failed */
export class PersistenceError extends PipelineError {
  readonly kind = 'persistence';
}

/** Read-back or matching failed */
export class ReconciliationError extends PipelineError {
  readonly kind = 'reconciliation';
}

/**
 * Exit points written to the run log and used as process exit codes
 */
export const ExitPoint = {
  Success: 0,
  DatabaseConnect: 1,
  AccessToken: 2,
  FetchListings: 3,
  Normalize: 4,
  SaveOrganizations: 5,
  SaveVacancies: 6,
  ReadBack: 7,
  Match: 8,
  WriteBack: 9,
} as const;

export type ExitPoint = (typeof ExitPoint)[keyof typeof ExitPoint];

/**
 * Process exit code when the run never started (bad configuration)
 * Kept apart from the exit points so it is never mistaken for a stage
 */
export const STARTUP_FAILURE_EXIT_CODE = 10;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
