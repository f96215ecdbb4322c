import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import {
  ITEMS_JSONL,
  METRICS_CLOCK,
  METRICS_JSON,
} from '../config/metrics.constants';
import { MetricsClock, MetricsSnapshot } from '../types/metrics.types';
import { resolveEffectiveInstant } from '../utils/date.util';
import { MetricsAggregatorService } from './metrics-aggregator.service';
import { MetricsStorageService } from './metrics-storage.service';

interface InFlightGeneration {
  now: Date;
  task: Promise<MetricsSnapshot>;
}

@Injectable()
export class MetricsGeneratorService {
  private readonly logger = new Logger(MetricsGeneratorService.name);
  private readonly inFlightGenerations = new Map<string, InFlightGeneration>();

  constructor(
    private readonly aggregatorService: MetricsAggregatorService,
    private readonly storageService: MetricsStorageService,
    @Inject(METRICS_CLOCK) private readonly clock: MetricsClock,
  ) {}

  // One run at a time per output file. A request that names no instant, or
  // the running one, joins it; another instant waits for it to settle.
  async generateSnapshot(options?: { now?: Date }): Promise<MetricsSnapshot> {
    const lockKey = METRICS_JSON;
    const inFlight = this.inFlightGenerations.get(lockKey);
    if (
      inFlight &&
      (!options?.now || options.now.getTime() === inFlight.now.getTime())
    ) {
      return inFlight.task;
    }

    const now = options?.now ?? this.clock.now();
    const pending = inFlight ? [inFlight.task] : [];
    const task = Promise.allSettled(pending).then(() =>
      this.generateSnapshotCore(now),
    );
    const entry: InFlightGeneration = { now, task };
    this.inFlightGenerations.set(lockKey, entry);
    try {
      return await task;
    } finally {
      if (this.inFlightGenerations.get(lockKey) === entry) {
        this.inFlightGenerations.delete(lockKey);
      }
    }
  }

  private async generateSnapshotCore(now: Date): Promise<MetricsSnapshot> {
    const startedAt = Date.now();
    const items = await this.storageService.loadItems();
    if (!items) {
      throw new NotFoundException(`parsed items not found: ${ITEMS_JSONL}`);
    }
    this.logger.log(
      `metrics generate start: items=${items.length} now=${now.toISOString()}`,
    );

    const snapshot = this.aggregatorService.aggregate(items, now);
    this.logger.log(`date quality: ${JSON.stringify(snapshot.debug)}`);

    const undatedSources = this.findUndatedMostRecent(snapshot);
    if (undatedSources.length > 0) {
      this.logger.warn(
        `most recent item has no parseable date: sources=${undatedSources.join(',')}`,
      );
    }

    const outPath = await this.storageService.saveSnapshot(snapshot);
    this.logger.log(
      `metrics generate done: items=${snapshot.items_total} sources=${Object.keys(snapshot.items_by_source).length} out=${outPath} elapsedMs=${Date.now() - startedAt}`,
    );

    return snapshot;
  }

  private findUndatedMostRecent(snapshot: MetricsSnapshot): string[] {
    return Object.entries(snapshot.most_recent_item_by_source)
      .filter(([, entry]) => resolveEffectiveInstant(entry) === null)
      .map(([source]) => source);
  }
}
