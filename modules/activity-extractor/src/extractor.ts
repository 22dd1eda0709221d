import { ExtractionError, errorMessage } from '../../errors/src/index.js';
import { createLogger, type Logger } from '../../logging/src/index.js';
import type { EngagementEvent } from '../../record-store/src/types.js';
import { hasNoProfileImage, parseEntry, rawEntryKey } from './parse.js';
import type { ActivitySurface, CommentBox } from './surface.js';
import { withTimeout } from './timeout.js';

export type StopReason = 'max_pages' | 'no_new_entries' | 'known_territory' | 'end_of_feed';

export interface ExtractOptions {
  maxPages: number;
  /** Ids the store has already counted; two in a row end the pass early. */
  isKnownEvent?: (sourceEventId: string) => boolean;
  signal?: AbortSignal;
  /** Bound on every wait for the page (navigation, listing, loading more) */
  timeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface ExtractionStats {
  pages: number;
  entriesSeen: number;
  yielded: number;
  skipped: number;
  filtered: number;
  stopReason: StopReason | null;
}

const DEFAULT_TIMEOUT_MS = 15000;

function freshStats(): ExtractionStats {
  return { pages: 0, entriesSeen: 0, yielded: 0, skipped: 0, filtered: 0, stopReason: null };
}

/**
 * Lazy, restartable sequence of engagement events read from the feed. Every
 * iteration starts a new pass from the first page; `stats` describes the
 * most recent pass.
 */
export class ActivityStream implements AsyncIterable<EngagementEvent> {
  private current: ExtractionStats = freshStats();

  constructor(
    private readonly surface: ActivitySurface<CommentBox>,
    private readonly options: ExtractOptions,
  ) {
    if (!Number.isInteger(options.maxPages) || options.maxPages < 1) {
      throw new RangeError(`maxPages must be a positive integer, got ${options.maxPages}`);
    }
  }

  get stats(): ExtractionStats {
    return { ...this.current };
  }

  [Symbol.asyncIterator](): AsyncIterator<EngagementEvent> {
    return this.pass();
  }

  private checkAbort(): void {
    if (this.options.signal?.aborted) {
      throw new ExtractionError('extraction aborted', 'aborted', { pages: this.current.pages });
    }
  }

  private async *pass(): AsyncGenerator<EngagementEvent> {
    const stats = freshStats();
    this.current = stats;
    const { surface } = this;
    const { maxPages, isKnownEvent } = this.options;
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const logger = this.options.logger ?? createLogger('activity-extractor');
    const now = this.options.now ?? (() => new Date());

    const seenRaw = new Set<string>();
    const emitted = new Set<string>();
    let knownStreak = 0;

    this.checkAbort();
    await withTimeout('open feed', timeoutMs, () => surface.open());

    for (let page = 1; ; page += 1) {
      this.checkAbort();
      const entries = await withTimeout(`list page ${page}`, timeoutMs, () => surface.listEntries());
      stats.pages = page;

      let fresh = 0;
      for (const raw of entries) {
        this.checkAbort();
        const rawKey = rawEntryKey(raw);
        if (seenRaw.has(rawKey)) continue;
        seenRaw.add(rawKey);
        fresh += 1;
        stats.entriesSeen += 1;

        if (hasNoProfileImage(raw)) {
          stats.filtered += 1;
          logger.debug('entry without profile image filtered', { page, userName: raw.userName });
          continue;
        }

        let event: EngagementEvent;
        try {
          event = parseEntry(raw, now());
        } catch (err) {
          stats.skipped += 1;
          logger.warn('skipped malformed entry', { page, reason: errorMessage(err) });
          continue;
        }

        if (emitted.has(event.sourceEventId)) continue;
        emitted.add(event.sourceEventId);
        stats.yielded += 1;
        yield event;

        knownStreak = isKnownEvent?.(event.sourceEventId) ? knownStreak + 1 : 0;
        if (knownStreak >= 2) {
          stats.stopReason = 'known_territory';
          logger.info('reached previously collected entries', { page, yielded: stats.yielded });
          return;
        }
      }

      logger.info('page read', { page, fresh, yielded: stats.yielded, skipped: stats.skipped });

      if (fresh === 0) {
        stats.stopReason = 'no_new_entries';
        return;
      }
      if (page >= maxPages) {
        stats.stopReason = 'max_pages';
        return;
      }
      this.checkAbort();
      const more = await withTimeout(`load page ${page + 1}`, timeoutMs, () => surface.loadMore());
      if (!more) {
        stats.stopReason = 'end_of_feed';
        return;
      }
    }
  }
}

export function extract(surface: ActivitySurface<CommentBox>, options: ExtractOptions): ActivityStream {
  return new ActivityStream(surface, options);
}

/** Reads a whole pass into memory. */
export async function collectAll(stream: AsyncIterable<EngagementEvent>): Promise<EngagementEvent[]> {
  const events: EngagementEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}
