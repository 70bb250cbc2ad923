export type MemJudgeErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION'
  | 'RESPONSE_PARSE'
  | 'MISSING_SCORE'
  | 'DUPLICATE_CHECK_FAILURE'
  | 'LLM_TRANSPORT';

export class MemJudgeError extends Error {
  constructor(message: string, public readonly code: MemJudgeErrorCode) {
    super(message);
    this.name = 'MemJudgeError';
  }
}

/** A judge, principle or example that must exist does not. */
export class NotFoundError extends MemJudgeError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends MemJudgeError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

export class ResponseParseError extends MemJudgeError {
  constructor(message: string, public readonly rawPreview: string) {
    super(message, 'RESPONSE_PARSE');
    this.name = 'ResponseParseError';
  }
}

export class MissingScoreError extends MemJudgeError {
  constructor(judgeName: string) {
    super(`Model response for judge '${judgeName}' is missing the 'score' field`, 'MISSING_SCORE');
    this.name = 'MissingScoreError';
  }
}

/** Stage-2 duplicate check failed; callers treat the candidate as unique. */
export class DuplicateCheckFailure extends MemJudgeError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'DUPLICATE_CHECK_FAILURE');
    this.name = 'DuplicateCheckFailure';
  }
}

/** Network, auth or rate-limit failure talking to the model endpoint. */
export class LlmTransportError extends MemJudgeError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'LLM_TRANSPORT');
    this.name = 'LlmTransportError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
