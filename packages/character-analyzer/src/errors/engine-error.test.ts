import { describe, expect, test } from 'vitest';

import { EngineError } from './engine-error';

describe('EngineError', () => {
  describe('constructor', () => {
    test('creates error with message and batch index', () => {
      const error = new EngineError('engine down', { batchIndex: 4 });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('EngineError');
      expect(error.message).toBe('engine down');
      expect(error.batchIndex).toBe(4);
    });

    test('leaves batch index undefined when not given', () => {
      expect(new EngineError('x').batchIndex).toBeUndefined();
    });
  });

  describe('getErrorMessage', () => {
    test('returns message from Error instance', () => {
      expect(EngineError.getErrorMessage(new Error('boom'))).toBe('boom');
    });

    test('returns String() for non-Error values', () => {
      expect(EngineError.getErrorMessage('plain')).toBe('plain');
      expect(EngineError.getErrorMessage(42)).toBe('42');
      expect(EngineError.getErrorMessage(undefined)).toBe('undefined');
    });
  });

  describe('fromError', () => {
    test('wraps with context, cause and batch index', () => {
      const cause = new Error('timeout');
      const error = EngineError.fromError('Batch 2 failed', cause, 2);

      expect(error.message).toBe('Batch 2 failed: timeout');
      expect(error.cause).toBe(cause);
      expect(error.batchIndex).toBe(2);
    });

    test('returns existing EngineErrors unchanged', () => {
      const original = new EngineError('already wrapped', { batchIndex: 1 });

      expect(EngineError.fromError('ignored', original, 9)).toBe(original);
    });
  });
});
