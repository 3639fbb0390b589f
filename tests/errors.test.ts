import { describe, it, expect } from 'vitest';
import {
  AppError,
  BackendError,
  BackendTimeoutError,
  EmbeddingDimensionError,
  FeedbackForUnknownQueryError,
  NotFoundError,
  ValidationError,
} from '../src/errors.js';

describe('errors', () => {
  it('should report the concrete class name', () => {
    const err = new FeedbackForUnknownQueryError('q-1');
    expect(err.name).toBe('FeedbackForUnknownQueryError');
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toBeInstanceOf(AppError);
    expect(err.code).toBe('NOT_FOUND');
    expect(err.details).toEqual({ queryId: 'q-1' });
  });

  it('should classify dimension mismatches as validation errors', () => {
    const err = new EmbeddingDimensionError(1536, 3);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err.message).toBe('Embedding dimension mismatch: expected 1536, got 3');
  });

  it('should carry backend names and causes', () => {
    const timeout = new BackendTimeoutError('general', 500);
    expect(timeout.code).toBe('BACKEND_TIMEOUT');
    expect(timeout.message).toBe('general did not respond within 500ms');

    const failure = new BackendError('specialized', 'HTTP 500', new Error('boom'));
    expect(failure.code).toBe('BACKEND_ERROR');
    expect(failure.details).toEqual({ backend: 'specialized', cause: 'boom' });
  });
});
