import type { FailureKind } from './types/index';

export class PipelineError extends Error {
  constructor(readonly kind: FailureKind, message: string) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** Raised by ConversationHub.wait when no handler stopped the wait in time */
export class WaitTimeoutError extends PipelineError {
  constructor(readonly timeoutMs: number) {
    super('Timeout', `No matching message within ${timeoutMs}ms`);
    this.name = 'WaitTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
