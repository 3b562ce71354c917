// rubify/errors - Failures that end an analysis request

export type AnalysisErrorKind =
  | 'invalid-request'
  | 'tokenization'
  | 'user-dictionary'
  | 'serialization';

export abstract class AnalysisError extends Error {
  abstract readonly kind: AnalysisErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidRequestError extends AnalysisError {
  readonly kind = 'invalid-request';
}

export class TokenizationError extends AnalysisError {
  readonly kind = 'tokenization';
}

export class UserDictionaryError extends AnalysisError {
  readonly kind = 'user-dictionary';
}

export class SerializationError extends AnalysisError {
  readonly kind = 'serialization';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
