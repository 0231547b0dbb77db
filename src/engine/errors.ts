// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * Raised when a sector, export record or scenario cannot be constructed.
 * Nothing is partially built when this is thrown.
 */
export class EngineValidationError extends Error {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly issues: readonly ValidationIssue[] = []
  ) {
    super(message);
    this.name = 'EngineValidationError';
  }
}

export type ReferenceDataState = 'idle' | 'loading' | 'ready' | 'failed';

/**
 * Raised when an evaluation arrives before reference data finished loading.
 */
export class ReferenceDataNotReadyError extends Error {
  readonly code = 'NOT_READY';

  constructor(readonly state: ReferenceDataState) {
    super(`Reference data is not ready (state: ${state})`);
    this.name = 'ReferenceDataNotReadyError';
  }
}
