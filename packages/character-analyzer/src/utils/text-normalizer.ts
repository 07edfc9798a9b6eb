import type { PageRange } from '@storycast/model';

import { NORMALIZER } from '../config/constants';

/** Horizontal whitespace, including NBSP and the Unicode space block */
const HORIZONTAL_WHITESPACE = /[ \t\f\v\u00A0\u1680\u2000-\u200B\u202F\u205F\u3000]+/g;

/**
 * Lines holding nothing but a page number: "12", "- 12 -", "[12]", "(12)",
 * "12.", "12 / 300", "Page 12", "Page 12 of 300"
 */
const PAGE_NUMBER_LINE =
  /^(?:page\s*)?[-\u2013\u2014([{.\s]*\d+(?:\s*(?:of|\/)\s*\d+)?[-\u2013\u2014)\]}.\s]*$/i;

const BLANK_LINE_SPLIT = /\n\s*\n/;

/**
 * Paragraphs and their page boundary mapping
 */
export interface ParagraphsWithPageMapping {
  paragraphs: string[];

  /**
   * `boundaries[i]` is the first paragraph index of page `i`; the last entry
   * equals the paragraph count
   */
  boundaries: number[];
}

/**
 * TextNormalizer - page cleanup and paragraph segmentation
 *
 * Turns raw extracted page text into paragraphs, the unit every later stage
 * packs, slices and maps back to pages.
 */
export class TextNormalizer {
  /**
   * Clean one page of raw text.
   *
   * - Unicode normalization (NFC) and LF line endings
   * - Horizontal whitespace runs collapsed, each line trimmed
   * - Page-number-only lines dropped
   * - Three or more line breaks collapsed to one blank line
   *
   * Idempotent. Absent input yields an empty string.
   */
  static cleanPage(raw: string | null | undefined): string {
    if (!raw) return '';

    const lines = raw
      .normalize('NFC')
      .replace(/\r\n?/g, '\n')
      .split('\n')
      .map((line) => line.replace(HORIZONTAL_WHITESPACE, ' ').trim())
      .filter((line) => !PAGE_NUMBER_LINE.test(line));

    return lines
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  /**
   * Clean every page, join them with a blank line, and split into paragraphs.
   * Paragraphs have their internal whitespace collapsed to single spaces;
   * those of `MIN_PARAGRAPH_LENGTH` characters or fewer are dropped.
   */
  static splitIntoParagraphs(pages: readonly string[]): string[] {
    const joined = pages
      .map((page) => this.cleanPage(page))
      .join(NORMALIZER.PARAGRAPH_SEPARATOR);
    return this.toParagraphs(joined);
  }

  /**
   * Same paragraphs as `splitIntoParagraphs`, plus where each page starts.
   * A page with no surviving paragraph shares its boundary with the next page.
   */
  static splitWithPageMapping(
    pages: readonly string[],
  ): ParagraphsWithPageMapping {
    const paragraphs: string[] = [];
    const boundaries: number[] = [];

    for (const page of pages) {
      boundaries.push(paragraphs.length);
      paragraphs.push(...this.toParagraphs(this.cleanPage(page)));
    }
    boundaries.push(paragraphs.length);

    return { paragraphs, boundaries };
  }

  /**
   * Pages covering an inclusive paragraph range.
   *
   * @returns null when the range is empty, reversed or outside the mapping
   */
  static findPagesForParagraphRange(
    startParagraph: number,
    endParagraph: number,
    boundaries: readonly number[],
  ): PageRange | null {
    const pageCount = boundaries.length - 1;
    if (pageCount < 1) return null;

    const paragraphCount = boundaries[pageCount];
    if (
      !Number.isInteger(startParagraph) ||
      !Number.isInteger(endParagraph) ||
      startParagraph < 0 ||
      endParagraph < startParagraph ||
      endParagraph >= paragraphCount
    ) {
      return null;
    }

    return {
      startPage: this.findPage(startParagraph, boundaries, pageCount),
      endPage: this.findPage(endParagraph, boundaries, pageCount),
    };
  }

  /**
   * Join paragraphs back into one text block
   */
  static mergeParagraphs(paragraphs: readonly string[]): string {
    return paragraphs.join(NORMALIZER.PARAGRAPH_SEPARATOR);
  }

  private static toParagraphs(text: string): string[] {
    if (!text) return [];
    return text
      .split(BLANK_LINE_SPLIT)
      .map((paragraph) => paragraph.replace(/\s+/g, ' ').trim())
      .filter(
        (paragraph) => paragraph.length > NORMALIZER.MIN_PARAGRAPH_LENGTH,
      );
  }

  // Last page whose first paragraph index is <= paragraphIndex
  private static findPage(
    paragraphIndex: number,
    boundaries: readonly number[],
    pageCount: number,
  ): number {
    let low = 0;
    let high = pageCount - 1;

    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (boundaries[mid] <= paragraphIndex) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return low;
  }
}
