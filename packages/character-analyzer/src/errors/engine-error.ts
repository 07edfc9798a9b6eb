/**
 * EngineError
 *
 * One batch's extraction call failed or returned output that did not
 * validate. The orchestrator records it and skips the batch.
 */
export class EngineError extends Error {
  /**
   * Batch the failure belongs to, when known
   */
  readonly batchIndex?: number;

  constructor(message: string, options?: ErrorOptions & { batchIndex?: number }) {
    super(message, options);
    this.name = 'EngineError';
    this.batchIndex = options?.batchIndex;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Wrap an unknown error with batch context. EngineErrors pass through.
   */
  static fromError(
    context: string,
    error: unknown,
    batchIndex?: number,
  ): EngineError {
    if (error instanceof EngineError) return error;
    return new EngineError(
      `${context}: ${EngineError.getErrorMessage(error)}`,
      { cause: error, batchIndex },
    );
  }
}
