export type OracleErrorCode =
  | 'MismatchedBatchLength'
  | 'UnknownSymbol'
  | 'RefDataNotAvailable'
  | 'DivisionByZero'
  | 'StateNotInitialized'
  | 'StateCorrupted'
  | 'InvalidMessage'
  | 'Unauthorized';

export class OracleError extends Error {
  constructor(
    readonly code: OracleErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'OracleError';
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: OracleError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const err = <T = never>(code: OracleErrorCode, message: string): Result<T> => ({
  ok: false,
  error: new OracleError(code, message),
});
