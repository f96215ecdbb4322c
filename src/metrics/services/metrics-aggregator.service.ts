import { Injectable } from '@nestjs/common';
import {
  CADENCE_WINDOW_DAYS,
  PREVIOUS_WINDOW_DAYS,
  RECENT_WINDOW_DAYS,
  TITLE_STOPWORDS,
  TOP_DUPLICATE_SAMPLES,
  TOP_GLOBAL_KEYWORDS,
  TOP_SOURCE_KEYWORDS,
  UNKNOWN_SOURCE,
} from '../config/metrics.constants';
import {
  AggregateOptions,
  DuplicateMetrics,
  KeywordMetrics,
  MetricsItem,
  MetricsSnapshot,
  MostRecentItem,
  TermCount,
  TermDelta,
} from '../types/metrics.types';
import {
  CountMap,
  countsFor,
  increment,
  incrementAll,
  positiveDelta,
  rankCounts,
  toRecord,
} from '../utils/counter.util';
import {
  formatDateYYYYMMDD,
  normalizeDate,
  subtractDays,
} from '../utils/date.util';
import { normalizeTitleKey, tokenizeTitle } from '../utils/text.util';

interface WindowBounds {
  recentSince: number;
  previousSince: number;
  cadenceSince: number;
}

interface MostRecentRecord {
  entry: MostRecentItem;
  instant: Date | null;
}

interface Accumulators {
  itemsBySource: CountMap;
  urlCounts: CountMap;
  titleCounts: CountMap;
  recentBySource: CountMap;
  perDayGlobal: CountMap;
  perDayBySource: Map<string, CountMap>;
  mostRecent: Map<string, MostRecentRecord>;
  keywordsGlobal: CountMap;
  keywordsBySource: Map<string, CountMap>;
  recentKeywordsGlobal: CountMap;
  previousKeywordsGlobal: CountMap;
  recentKeywordsBySource: Map<string, CountMap>;
  previousKeywordsBySource: Map<string, CountMap>;
  publishedParsed: number;
  parsedAtParsed: number;
  effectiveParsed: number;
}

/**
 * Builds the metrics snapshot from a fully materialized item collection.
 * Pure: `now` is passed in and every call starts from empty accumulators.
 */
@Injectable()
export class MetricsAggregatorService {
  aggregate(
    items: readonly MetricsItem[],
    now: Date,
    options: AggregateOptions = {},
  ): MetricsSnapshot {
    const stopwords = options.stopwords ?? TITLE_STOPWORDS;
    const bounds: WindowBounds = {
      recentSince: subtractDays(now, RECENT_WINDOW_DAYS).getTime(),
      previousSince: subtractDays(now, PREVIOUS_WINDOW_DAYS).getTime(),
      cadenceSince: subtractDays(now, CADENCE_WINDOW_DAYS).getTime(),
    };
    const acc = this.createAccumulators();

    for (const item of items) {
      this.accumulate(acc, item, bounds, stopwords);
    }

    return {
      generated_at: now.toISOString(),
      items_total: items.length,
      items_by_source: toRecord(acc.itemsBySource),
      items_last_7d_by_source: toRecord(acc.recentBySource),
      most_recent_item_by_source: Object.fromEntries(
        [...acc.mostRecent].map(([source, record]): [string, MostRecentItem] => [
          source,
          record.entry,
        ]),
      ),
      cadence_last_30d: {
        items_per_day_global: toRecord(acc.perDayGlobal),
        items_per_day_by_source: this.mapGroups(acc.perDayBySource, toRecord),
      },
      keywords: this.buildKeywords(acc),
      duplicates: this.buildDuplicates(acc),
      debug: {
        published_at_parsed: acc.publishedParsed,
        parsed_at_parsed: acc.parsedAtParsed,
        effective_dt_parsed: acc.effectiveParsed,
      },
    };
  }

  private accumulate(
    acc: Accumulators,
    item: MetricsItem,
    bounds: WindowBounds,
    stopwords: ReadonlySet<string>,
  ): void {
    const source = item.source || UNKNOWN_SOURCE;
    increment(acc.itemsBySource, source);

    const url = item.url?.trim() ?? '';
    if (url) {
      increment(acc.urlCounts, url);
    }
    const title = item.title?.trim() ?? '';
    const titleKey = normalizeTitleKey(title);
    if (titleKey) {
      increment(acc.titleCounts, titleKey);
    }

    const publishedAt = normalizeDate(item.published_at);
    const parsedAt = normalizeDate(item.parsed_at);
    const instant = publishedAt ?? parsedAt;
    if (publishedAt) {
      acc.publishedParsed += 1;
    }
    if (parsedAt) {
      acc.parsedAtParsed += 1;
    }
    if (instant) {
      acc.effectiveParsed += 1;
      const time = instant.getTime();
      if (time >= bounds.recentSince) {
        increment(acc.recentBySource, source);
      }
      if (time >= bounds.cadenceSince) {
        const day = formatDateYYYYMMDD(instant);
        increment(acc.perDayGlobal, day);
        increment(countsFor(acc.perDayBySource, source), day);
      }
    }

    this.trackMostRecent(acc.mostRecent, source, item, instant);

    const tokens = tokenizeTitle(title, stopwords);
    if (tokens.length === 0) {
      return;
    }
    incrementAll(acc.keywordsGlobal, tokens);
    incrementAll(countsFor(acc.keywordsBySource, source), tokens);

    if (!instant) {
      return;
    }
    const time = instant.getTime();
    if (time >= bounds.recentSince) {
      incrementAll(acc.recentKeywordsGlobal, tokens);
      incrementAll(countsFor(acc.recentKeywordsBySource, source), tokens);
    } else if (time >= bounds.previousSince) {
      incrementAll(acc.previousKeywordsGlobal, tokens);
      incrementAll(countsFor(acc.previousKeywordsBySource, source), tokens);
    }
  }

  // The first item of a source always takes the slot, dated or not; later
  // items need a date strictly newer than the holder's (or a dateless holder).
  private trackMostRecent(
    mostRecent: Map<string, MostRecentRecord>,
    source: string,
    item: MetricsItem,
    instant: Date | null,
  ): void {
    const current = mostRecent.get(source);
    const replaces =
      !current ||
      (instant !== null &&
        (current.instant === null ||
          instant.getTime() > current.instant.getTime()));
    if (!replaces) {
      return;
    }

    mostRecent.set(source, {
      instant,
      entry: {
        title: item.title ?? null,
        url: item.url ?? null,
        published_at: item.published_at ?? null,
        parsed_at: item.parsed_at ?? null,
      },
    });
  }

  private buildKeywords(acc: Accumulators): KeywordMetrics {
    const trendingBySource = Object.fromEntries(
      [...acc.itemsBySource.keys()].map((source): [string, TermDelta[]] => [
        source,
        this.toTermDeltas(
          positiveDelta(
            acc.recentKeywordsBySource.get(source) ?? new Map<string, number>(),
            acc.previousKeywordsBySource.get(source),
          ),
          TOP_SOURCE_KEYWORDS,
        ),
      ]),
    );

    return {
      top_global: this.toTermCounts(acc.keywordsGlobal, TOP_GLOBAL_KEYWORDS),
      top_by_source: this.mapGroups(acc.keywordsBySource, (counts) =>
        this.toTermCounts(counts, TOP_SOURCE_KEYWORDS),
      ),
      trending_last_7d_vs_prev_7d_global: this.toTermDeltas(
        positiveDelta(acc.recentKeywordsGlobal, acc.previousKeywordsGlobal),
        TOP_GLOBAL_KEYWORDS,
      ),
      trending_last_7d_vs_prev_7d_by_source: trendingBySource,
    };
  }

  private buildDuplicates(acc: Accumulators): DuplicateMetrics {
    const repeatedUrls = this.repeatedKeys(acc.urlCounts);
    const repeatedTitles = this.repeatedKeys(acc.titleCounts);

    return {
      duplicate_urls: repeatedUrls.size,
      duplicate_titles: repeatedTitles.size,
      top_duplicate_urls: rankCounts(repeatedUrls, TOP_DUPLICATE_SAMPLES).map(
        ([url]) => url,
      ),
      top_duplicate_titles: rankCounts(
        repeatedTitles,
        TOP_DUPLICATE_SAMPLES,
      ).map(([title]) => title),
    };
  }

  private repeatedKeys(counts: CountMap): CountMap {
    return new Map([...counts].filter(([, count]) => count > 1));
  }

  private toTermCounts(counts: CountMap, limit: number): TermCount[] {
    return rankCounts(counts, limit).map(([term, count]) => ({ term, count }));
  }

  private toTermDeltas(delta: CountMap, limit: number): TermDelta[] {
    return rankCounts(delta, limit).map(([term, value]) => ({
      term,
      delta: value,
    }));
  }

  private mapGroups<T>(
    grouped: Map<string, CountMap>,
    project: (counts: CountMap) => T,
  ): Record<string, T> {
    return Object.fromEntries(
      [...grouped].map(([group, counts]): [string, T] => [
        group,
        project(counts),
      ]),
    );
  }

  private createAccumulators(): Accumulators {
    return {
      itemsBySource: new Map(),
      urlCounts: new Map(),
      titleCounts: new Map(),
      recentBySource: new Map(),
      perDayGlobal: new Map(),
      perDayBySource: new Map(),
      mostRecent: new Map(),
      keywordsGlobal: new Map(),
      keywordsBySource: new Map(),
      recentKeywordsGlobal: new Map(),
      previousKeywordsGlobal: new Map(),
      recentKeywordsBySource: new Map(),
      previousKeywordsBySource: new Map(),
      publishedParsed: 0,
      parsedAtParsed: 0,
      effectiveParsed: 0,
    };
  }
}
