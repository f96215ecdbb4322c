// Field names follow the JSONL written by the parse step and the JSON read by
// the report/dashboard renderers.

export interface MetricsItem {
  source?: string | null;
  title?: string | null;
  url?: string | null;
  published_at?: string | null;
  parsed_at?: string | null;
  [field: string]: unknown;
}

export interface MostRecentItem {
  title: string | null;
  url: string | null;
  published_at: string | null;
  parsed_at: string | null;
}

export interface TermCount {
  term: string;
  count: number;
}

export interface TermDelta {
  term: string;
  delta: number;
}

export interface CadenceMetrics {
  items_per_day_global: Record<string, number>;
  items_per_day_by_source: Record<string, Record<string, number>>;
}

export interface KeywordMetrics {
  top_global: TermCount[];
  top_by_source: Record<string, TermCount[]>;
  trending_last_7d_vs_prev_7d_global: TermDelta[];
  trending_last_7d_vs_prev_7d_by_source: Record<string, TermDelta[]>;
}

export interface DuplicateMetrics {
  duplicate_urls: number;
  duplicate_titles: number;
  top_duplicate_urls: string[];
  top_duplicate_titles: string[];
}

export interface DateQualityMetrics {
  published_at_parsed: number;
  parsed_at_parsed: number;
  effective_dt_parsed: number;
}

export interface MetricsSnapshot {
  generated_at: string;
  items_total: number;
  items_by_source: Record<string, number>;
  items_last_7d_by_source: Record<string, number>;
  most_recent_item_by_source: Record<string, MostRecentItem>;
  cadence_last_30d: CadenceMetrics;
  keywords: KeywordMetrics;
  duplicates: DuplicateMetrics;
  debug: DateQualityMetrics;
}

export interface AggregateOptions {
  stopwords?: ReadonlySet<string>;
}

export interface MetricsClock {
  now(): Date;
}
