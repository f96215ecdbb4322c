import path from 'node:path';
import stopwordLists from './stopwords.json';

export const SERVICE_NAME = 'travel-metrics';
export const SERVICE_VERSION = '1.0.0';

function readPositiveInt(envName: string, fallback: number): number {
  const raw = Number(process.env[envName] ?? fallback);
  return Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : fallback;
}

export const RECENT_WINDOW_DAYS = 7;
export const PREVIOUS_WINDOW_DAYS = 14;
export const CADENCE_WINDOW_DAYS = 30;
export const MIN_TOKEN_LENGTH = 3;

export const TOP_GLOBAL_KEYWORDS = readPositiveInt('TOP_GLOBAL_KEYWORDS', 20);
export const TOP_SOURCE_KEYWORDS = readPositiveInt('TOP_SOURCE_KEYWORDS', 15);
export const TOP_DUPLICATE_SAMPLES = readPositiveInt(
  'TOP_DUPLICATE_SAMPLES',
  10,
);

export const UNKNOWN_SOURCE = 'unknown';

const dataDir =
  process.env.DATA_DIR ?? path.join(process.cwd(), 'data', 'processed');
export const ITEMS_JSONL =
  process.env.ITEMS_JSONL ?? path.join(dataDir, 'parsed_items.jsonl');
export const METRICS_JSON =
  process.env.METRICS_JSON ?? path.join(dataDir, 'metrics.json');

export const METRICS_CLOCK = Symbol('METRICS_CLOCK');

// English + Spanish function words, plus travel boilerplate that would
// otherwise dominate every ranking.
export const TITLE_STOPWORDS: ReadonlySet<string> = new Set([
  ...stopwordLists.en,
  ...stopwordLists.es,
  ...stopwordLists.domain,
]);
