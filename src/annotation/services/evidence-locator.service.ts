/**
 * Evidence Locator Service
 * Finds credited lines in the document with a forward-only page pointer
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DEFAULT_MATCHING } from '../../common/constants';
import { midY, roundTo, type Rect } from '../../common/types/geometry';
import type { EvidenceMatchingConfig } from '../../common/types/layout';
import type { AnnotatableDocument } from '../../pdf/interfaces/annotatable-document.interface';

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export type MatchTier =
  | 'exact-current'
  | 'exact-lookahead'
  | 'fallback-words'
  | 'none';

/**
 * Mutable state of one line-matching pass
 */
export interface LocatorContext {
  /** Page searched first; never moves backwards */
  pageIndex: number;
  /**
   * Rounded mid-y positions already ticked. Keyed per page rather than one
   * set for the whole document, so lines at equal heights on different pages
   * do not suppress each other's ticks.
   */
  ticks: Map<number, Set<number>>;
}

export interface EvidenceMatch {
  matched: boolean;
  tier: MatchTier;
  /** The searched prefix */
  searchText: string;
  pageIndex?: number;
  rect?: Rect;
  positionKey?: number;
  /** Position already bears a tick */
  duplicate: boolean;
}

@Injectable()
export class EvidenceLocatorService {
  private readonly logger = new Logger(EvidenceLocatorService.name);
  private readonly matching: EvidenceMatchingConfig;

  constructor(private readonly configService: ConfigService) {
    this.matching =
      this.configService.get<EvidenceMatchingConfig>('annotation.matching') ??
      DEFAULT_MATCHING;
  }

  createContext(): LocatorContext {
    return { pageIndex: 0, ticks: new Map() };
  }

  /**
   * Locate one evidence line, moving the context's pointer forward on a match
   * further down the document
   */
  locate(
    document: AnnotatableDocument,
    line: string,
    context: LocatorContext,
  ): EvidenceMatch {
    const searchText = [...line]
      .slice(0, this.matching.prefixLength)
      .join('')
      .trim();
    const unmatched: EvidenceMatch = {
      matched: false,
      tier: 'none',
      searchText,
      duplicate: false,
    };

    if (!searchText) {
      this.logger.debug('Skipping empty evidence line');
      return unmatched;
    }
    if (context.pageIndex >= document.pageCount) {
      this.logger.warn(`No pages left to search for '${searchText}'`);
      return unmatched;
    }

    const current = document.page(context.pageIndex).search(searchText);
    if (current.length > 0) {
      this.logger.debug(
        `Exact match for '${searchText}' on page ${context.pageIndex + 1}`,
      );
      return this.hit(context, 'exact-current', searchText, context.pageIndex, current[0]);
    }

    for (let index = context.pageIndex + 1; index < document.pageCount; index++) {
      const rects = document.page(index).search(searchText);
      if (rects.length > 0) {
        this.logger.debug(
          `Exact match for '${searchText}' found on later page ${index + 1}`,
        );
        context.pageIndex = index;
        return this.hit(context, 'exact-lookahead', searchText, index, rects[0]);
      }
    }

    const words = [...new Set(searchText.match(WORD_PATTERN) ?? [])];
    const lastPage = Math.min(context.pageIndex + 1, document.pageCount - 1);
    for (let index = context.pageIndex; index <= lastPage; index++) {
      const page = document.page(index);
      const hits: Rect[] = [];
      for (const word of words) {
        const rects = page.search(word);
        if (rects.length > 0) {
          hits.push(rects[0]);
        }
        if (hits.length >= this.matching.fallbackMinWords) {
          this.logger.debug(
            `Fallback word match for '${searchText}' on page ${index + 1}`,
          );
          context.pageIndex = index;
          return this.hit(context, 'fallback-words', searchText, index, hits[0]);
        }
      }
    }

    this.logger.warn(
      `No match for '${searchText}' from page ${context.pageIndex + 1}`,
    );
    return unmatched;
  }

  /**
   * Record a tick at a matched position
   */
  registerTick(context: LocatorContext, pageIndex: number, positionKey: number): void {
    let ticks = context.ticks.get(pageIndex);
    if (!ticks) {
      ticks = new Set();
      context.ticks.set(pageIndex, ticks);
    }
    ticks.add(positionKey);
  }

  private hit(
    context: LocatorContext,
    tier: MatchTier,
    searchText: string,
    pageIndex: number,
    rect: Rect,
  ): EvidenceMatch {
    const positionKey = roundTo(midY(rect), this.matching.positionPrecision);
    return {
      matched: true,
      tier,
      searchText,
      pageIndex,
      rect,
      positionKey,
      duplicate: context.ticks.get(pageIndex)?.has(positionKey) ?? false,
    };
  }
}
