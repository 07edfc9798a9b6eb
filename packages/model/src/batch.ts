/**
 * A contiguous slice of paragraphs sized to fit one engine call
 */
export interface ParagraphBatch {
  /**
   * 0-based position in emission order
   */
  batchIndex: number;

  /**
   * Index of the first paragraph in the batch
   */
  startParagraphIndex: number;

  /**
   * Index of the last paragraph in the batch (inclusive)
   */
  endParagraphIndex: number;

  /**
   * Paragraphs joined with a blank line
   */
  text: string;

  paragraphCount: number;

  /**
   * Heuristic token count of `text`
   */
  estimatedTokens: number;
}

/**
 * 0-based inclusive range of source pages
 */
export interface PageRange {
  startPage: number;
  endPage: number;
}
