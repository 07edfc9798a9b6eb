import { describe, expect, test } from 'vitest';

import { NormalizationAnomalyError } from './normalization-anomaly-error';

describe('NormalizationAnomalyError', () => {
  test('reports the page count', () => {
    const error = new NormalizationAnomalyError(3);

    expect(error.name).toBe('NormalizationAnomalyError');
    expect(error.pageCount).toBe(3);
    expect(error.message).toBe(
      'Normalization produced no paragraphs from 3 non-empty page(s)',
    );
  });
});
