/**
 * NormalizationAnomalyError
 *
 * Non-empty input produced no usable paragraphs. Surfaces as a failed
 * session rather than an empty success.
 */
export class NormalizationAnomalyError extends Error {
  readonly pageCount: number;

  constructor(pageCount: number) {
    super(
      `Normalization produced no paragraphs from ${pageCount} non-empty page(s)`,
    );
    this.name = 'NormalizationAnomalyError';
    this.pageCount = pageCount;
  }
}
