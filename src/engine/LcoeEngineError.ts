import type { ErrorCode } from '../contracts/errors.ids';

/**
 * Raised by every engine entry point that cannot produce a meaningful number.
 *
 * `code` is stable and safe to branch on; `message` is for people.
 * `issues` is only populated for `invalid_parameters` and lists every
 * violated invariant, not just the first.
 */
export class LcoeEngineError extends Error {
  readonly code: ErrorCode;
  readonly issues: readonly string[];

  constructor(code: ErrorCode, message: string, issues: readonly string[] = []) {
    super(message);
    this.name = 'LcoeEngineError';
    this.code = code;
    this.issues = issues;
  }
}

export function isLcoeEngineError(err: unknown): err is LcoeEngineError {
  return err instanceof LcoeEngineError;
}
