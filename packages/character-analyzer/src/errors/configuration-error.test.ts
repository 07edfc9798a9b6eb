import { describe, expect, test } from 'vitest';

import { ConfigurationError } from './configuration-error';

describe('ConfigurationError', () => {
  test('carries name, message and cause', () => {
    const cause = new RangeError('too big');
    const error = new ConfigurationError('bad budget', { cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConfigurationError');
    expect(error.message).toBe('bad budget');
    expect(error.cause).toBe(cause);
  });
});
