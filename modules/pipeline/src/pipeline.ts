import { collectAll, extract, type ExtractionStats } from '../../activity-extractor/src/extractor.js';
import { RoomActivitySurface } from '../../activity-extractor/src/room-surface.js';
import type { ActivitySurface } from '../../activity-extractor/src/surface.js';
import { withTimeout } from '../../activity-extractor/src/timeout.js';
import type { Config } from '../../config/src/types.js';
import { UnknownUserError, errorMessage } from '../../errors/src/index.js';
import { createLogger, type Logger } from '../../logging/src/index.js';
import { merge } from '../../record-store/src/merge.js';
import { load, save, withStoreLock } from '../../record-store/src/store.js';
import { findUser, type EngagementEvent, type Store } from '../../record-store/src/types.js';
import { connect } from '../../session-connector/src/index.js';
import { stage, type StagedOutcome } from '../../staging-driver/src/index.js';
import { buildStagingRequest } from '../../template-selector/src/select.js';
import type { StagingRequest, Template } from '../../template-selector/src/types.js';
import type { FileLockOptions } from '../../state/src/file-lock.js';

/** A live activity surface plus the way to let go of it */
export interface SurfaceSession {
  surface: ActivitySurface;
  /** `keepPage` leaves a tab the session opened in place for the operator */
  close(options?: { keepPage?: boolean }): Promise<void>;
}

export type SurfaceFactory = () => Promise<SurfaceSession>;

/** Closes `session`, logging a failure instead of throwing it. */
async function closeSession(session: SurfaceSession, logger: Logger, options: { keepPage?: boolean } = {}): Promise<void> {
  try {
    await session.close(options);
  } catch (err) {
    logger.warn('closing the browser session failed', { error: errorMessage(err) });
  }
}

/** Connects to the configured debug endpoint and drives the tab as a RoomActivitySurface. */
export function roomSurfaceFactory(config: Config, logger?: Logger): SurfaceFactory {
  return async () => {
    const handle = await connect(config.debugEndpoint, {
      timeoutMs: config.connect.timeoutMs,
      retries: config.connect.retries,
      retryDelayMs: config.connect.retryDelayMs,
      targetOrigin: new URL(config.feed.startUrl).origin,
      logger,
    });
    const surface = new RoomActivitySurface(handle.page, {
      startUrl: config.feed.startUrl,
      notificationsLinkName: config.feed.notificationsLinkName,
      settleMs: config.feed.settleMs,
      actionTimeoutMs: config.feed.timeoutMs,
      searchPages: config.feed.maxPages,
      logger,
    });
    return {
      surface,
      close: (options = {}) => handle.release({ closeOpenedPage: !options.keepPage }),
    };
  };
}

export interface CollectDeps {
  storePath: string;
  openSurface: SurfaceFactory;
  logger?: Logger;
  lockOptions?: FileLockOptions;
}

export interface CollectOptions {
  maxPages: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface CollectResult {
  storePath: string;
  newlyCounted: EngagementEvent[];
  stats: ExtractionStats;
  /** Users in the store after the merge */
  users: number;
}

function knownEventIds(store: Store): Set<string> {
  const ids = new Set<string>();
  for (const record of Object.values(store.users)) {
    for (const id of record.seenEventIds) ids.add(id);
  }
  return ids;
}

/**
 * Reads the activity feed and merges it into the store. The merge runs once
 * the whole pass has been read; a pass that fails (including abort and
 * timeout) leaves the store as it was.
 */
export async function collect(deps: CollectDeps, options: CollectOptions): Promise<CollectResult> {
  const logger = deps.logger ?? createLogger('pipeline');
  const known = knownEventIds(await load(deps.storePath));

  const session = await deps.openSurface();
  let events: EngagementEvent[];
  let stats: ExtractionStats;
  try {
    const stream = extract(session.surface, {
      maxPages: options.maxPages,
      isKnownEvent: (id) => known.has(id),
      signal: options.signal,
      timeoutMs: options.timeoutMs,
      logger,
      now: options.now,
    });
    events = await collectAll(stream);
    stats = stream.stats;
  } finally {
    await closeSession(session, logger);
  }

  return withStoreLock(
    deps.storePath,
    async () => {
      const current = await load(deps.storePath);
      const result = merge(current, events);
      if (result.newlyCounted.length > 0) {
        await save(deps.storePath, result.store);
      }
      const users = Object.keys(result.store.users).length;
      logger.info('collect finished', {
        read: events.length,
        newlyCounted: result.newlyCounted.length,
        users,
        stopReason: stats.stopReason,
      });
      return { storePath: deps.storePath, newlyCounted: result.newlyCounted, stats, users };
    },
    deps.lockOptions,
  );
}

/** Template choice and rendered text for `userId`, without touching the browser. */
export async function previewForUser(storePath: string, templates: readonly Template[], userId: string): Promise<StagingRequest> {
  const store = await load(storePath);
  const record = findUser(store, userId);
  if (!record) throw new UnknownUserError(userId);
  return buildStagingRequest(record, templates);
}

export interface StageDeps {
  storePath: string;
  templates: readonly Template[];
  openSurface: SurfaceFactory;
  /** Bound on opening the feed and on staging */
  timeoutMs?: number;
  logger?: Logger;
}

export interface StageResult {
  outcome: StagedOutcome;
  /** Null when the user is not in the store */
  request: StagingRequest | null;
}

/**
 * Selection interface: renders the template chosen for `userId` and stages
 * it in the browser. The store is read, never written.
 */
export async function stageForUser(deps: StageDeps, userId: string): Promise<StageResult> {
  const logger = deps.logger ?? createLogger('pipeline');
  const store = await load(deps.storePath);
  const record = findUser(store, userId);
  if (!record) {
    logger.warn('user not in the store', { userId });
    return { outcome: 'user_not_found', request: null };
  }
  const request = buildStagingRequest(record, deps.templates);

  const session = await deps.openSurface();
  try {
    const { surface } = session;
    await withTimeout('open feed', deps.timeoutMs ?? 15000, () => surface.open());
    const outcome = await stage(surface, userId, request.renderedText, { timeoutMs: deps.timeoutMs, logger });
    logger.info('staging finished', { userId, templateId: request.templateId, outcome });
    return { outcome, request };
  } finally {
    // the staged text stays in the tab for the operator to submit
    await closeSession(session, logger, { keepPage: true });
  }
}
