import { EventEmitter } from 'eventemitter3';
import { CorpusSnapshot } from './snapshot.js';
import { parseCorpusDocument } from './loader.js';
import { StatisticSchema, TimestampSchema } from './schema.js';
import {
  CorpusConflictError,
  CorpusLoadError,
  CorpusUnavailableError,
  InvalidArgumentError,
  NotFoundError,
  isNewsdeskError,
} from '../errors.js';
import type { CorpusData, Statistic, WireItem } from './types.js';

// ---------------------------------------------------------------------------
// Store event types
// ---------------------------------------------------------------------------

export interface SnapshotSwapEvent {
  previousVersion: number | null;
  version: number;
  articles: number;
  statistics: number;
  wireItems: number;
  reason: 'replace' | 'upsert' | 'statistic';
}

export interface RefreshRejectedEvent {
  error: Error;
  reason: 'replace' | 'upsert' | 'statistic';
}

export interface CorpusStoreEvents {
  'snapshot:swap': (event: SnapshotSwapEvent) => void;
  'refresh:rejected': (event: RefreshRejectedEvent) => void;
}

/**
 * Owns the reference to the current corpus snapshot.
 *
 * Writers build a complete new snapshot and swap the reference in one
 * assignment; readers call `snapshot()` once per query and keep using that
 * object, so they see either the old or the new corpus, never a mix.
 */
export class CorpusStore extends EventEmitter<CorpusStoreEvents> {
  private current: CorpusSnapshot | null = null;
  private nextVersion = 1;

  /** The current snapshot. Throws until the first successful load. */
  snapshot(): CorpusSnapshot {
    if (!this.current) {
      throw new CorpusUnavailableError();
    }
    return this.current;
  }

  get isLoaded(): boolean {
    return this.current !== null;
  }

  get version(): number | null {
    return this.current?.version ?? null;
  }

  /**
   * Replace the whole corpus. Ids may disappear, but an article that survives
   * must keep its publish time and statistics must not go back in time.
   */
  replace(document: unknown): CorpusSnapshot {
    return this.commit('replace', () => {
      const data = parseCorpusDocument(document);
      if (this.current) {
        assertNoRewrite(this.current, data);
      }
      return data;
    });
  }

  /** Merge articles, statistics and wire items keyed by id/key. Nothing is removed. */
  upsert(patch: unknown): CorpusSnapshot {
    return this.commit('upsert', () => {
      const incoming = parseCorpusDocument(patch);
      const base = this.current?.toData() ?? { articles: [], statistics: [], wire: [] };
      if (this.current) {
        assertNoRewrite(this.current, incoming);
      }
      return {
        articles: mergeBy(base.articles, incoming.articles, a => a.id),
        statistics: mergeBy(base.statistics, incoming.statistics, s => s.key),
        wire: mergeBy(base.wire, incoming.wire, w => w.id),
      };
    });
  }

  /** Refresh the value of one existing statistic. */
  updateStatistic(key: string, value: number | string, updatedAt: string): CorpusSnapshot {
    return this.commit('statistic', () => {
      const snapshot = this.snapshot();
      const existing = snapshot.allStatistics().get(key);
      if (!existing) {
        throw new NotFoundError(`Unknown statistic "${key}"`, key);
      }
      if (!StatisticSchema.shape.value.safeParse(value).success) {
        throw new InvalidArgumentError(`Invalid value for statistic "${key}"`, 'value');
      }
      const parsedAt = TimestampSchema.safeParse(updatedAt);
      if (!parsedAt.success) {
        throw new InvalidArgumentError(`Invalid timestamp: "${updatedAt}"`, 'updatedAt');
      }
      const updated: Statistic = { ...existing, value, updatedAt: parsedAt.data };
      const data = snapshot.toData();
      assertNoRewrite(snapshot, { articles: [], statistics: [updated], wire: [] });
      return {
        ...data,
        statistics: mergeBy(data.statistics, [updated], s => s.key),
      };
    });
  }

  private commit(reason: SnapshotSwapEvent['reason'], build: () => CorpusData): CorpusSnapshot {
    let next: CorpusSnapshot;
    try {
      next = new CorpusSnapshot(build(), this.nextVersion);
    } catch (err) {
      const error = isNewsdeskError(err)
        ? err
        : new CorpusLoadError(`Failed to build corpus snapshot: ${err instanceof Error ? err.message : String(err)}`);
      this.emit('refresh:rejected', { error, reason });
      throw error;
    }

    this.nextVersion++;
    const previousVersion = this.current?.version ?? null;
    this.current = next;

    this.emit('snapshot:swap', {
      previousVersion,
      version: next.version,
      articles: next.articleCount,
      statistics: next.statisticCount,
      wireItems: next.wireCount,
      reason,
    });
    return next;
  }
}

function mergeBy<T>(base: readonly T[], incoming: readonly T[], keyOf: (item: T) => string): T[] {
  const merged = new Map<string, T>();
  for (const item of base) merged.set(keyOf(item), item);
  for (const item of incoming) merged.set(keyOf(item), item);
  return [...merged.values()];
}

/**
 * Published history is immutable: an article keeps its publish time, a wire
 * item keeps its time and text, and a statistic never moves backwards.
 */
function assertNoRewrite(previous: CorpusSnapshot, next: CorpusData): void {
  for (const article of next.articles) {
    const old = previous.getArticle(article.id);
    if (old && old.publishedAt !== article.publishedAt) {
      throw new CorpusConflictError(
        `Article "${article.id}" was published at ${old.publishedAt}; refusing to change it to ${article.publishedAt}`,
        article.id,
      );
    }
  }

  const wireById = new Map(previous.wireItems().map((w): [string, WireItem] => [w.id, w]));
  for (const item of next.wire) {
    const old = wireById.get(item.id);
    if (old && (old.timestamp !== item.timestamp || old.text !== item.text)) {
      throw new CorpusConflictError(`Wire item "${item.id}" is already published and cannot change`, item.id);
    }
  }

  const stats = previous.allStatistics();
  for (const stat of next.statistics) {
    const old = stats.get(stat.key);
    if (old && stat.updatedAt < old.updatedAt) {
      throw new CorpusConflictError(
        `Statistic "${stat.key}" was updated at ${old.updatedAt}; refusing older value from ${stat.updatedAt}`,
        stat.key,
      );
    }
  }
}
