import type { Locator, Page } from 'playwright-core';
import { createLogger, type Logger } from '../../logging/src/index.js';
import { actorIdFromImageUrl } from './parse.js';
import { NOT_FOLLOWING_TEXT, ROOM_SELECTORS, toRobustSelector, type RoomSelectors } from './selectors.js';
import type { ActivitySurface, CommentBox, RawActivityEntry } from './surface.js';

export interface RoomSurfaceOptions {
  startUrl?: string;
  /** Accessible name of the notifications link */
  notificationsLinkName?: string;
  /** Wait after each scroll for lazily loaded entries */
  settleMs?: number;
  /** Scrolls per loadMore() before concluding the feed has ended */
  scrollAttempts?: number;
  /** Timeout of single page actions (clicks, waits for elements) */
  actionTimeoutMs?: number;
  /** Pages scrolled while looking for a user's entry before giving up */
  searchPages?: number;
  selectors?: RoomSelectors;
  logger?: Logger;
}

export const DEFAULT_START_URL = 'https://room.rakuten.co.jp/items';

/** Fields read from one rendered activity item, before interpretation */
export interface ActivityItemFields {
  key: string | null;
  userName: string | null;
  imageSrc: string | null;
  actionText: string | null;
  /** `title` attribute of the timestamp element, which holds the absolute time */
  timestampTitle: string | null;
  timestampText: string | null;
  /** Text of the follow badge; null when the item has none */
  followBadgeText: string | null;
}

function trimmed(value: string | null): string | null {
  const result = value?.trim();
  return result ? result : null;
}

export function toRawEntry(fields: ActivityItemFields): RawActivityEntry {
  return {
    key: trimmed(fields.key),
    userName: trimmed(fields.userName),
    profileImageUrl: trimmed(fields.imageSrc),
    actionText: trimmed(fields.actionText),
    timestampText: trimmed(fields.timestampTitle) ?? trimmed(fields.timestampText),
    isFollowing: fields.followBadgeText === null ? null : !fields.followBadgeText.includes(NOT_FOLLOWING_TEXT),
  };
}

/**
 * Comment control on a post page. `locator` is null when the user's profile
 * offers nothing to comment on.
 */
export class RoomCommentBox implements CommentBox {
  constructor(
    readonly userId: string,
    readonly locator: Locator | null,
  ) {}

  async isEditable(): Promise<boolean> {
    if (!this.locator) return false;
    if (!(await this.locator.isVisible())) return false;
    return this.locator.isEditable();
  }
}

/** ActivitySurface over a Rakuten ROOM tab driven through Playwright. */
export class RoomActivitySurface implements ActivitySurface<RoomCommentBox> {
  private readonly startUrl: string;
  private readonly linkName: string;
  private readonly settleMs: number;
  private readonly scrollAttempts: number;
  private readonly actionTimeoutMs: number;
  private readonly searchPages: number;
  private readonly selectors: RoomSelectors;
  private readonly logger: Logger;
  private feedAvailable = false;

  constructor(private readonly page: Page, options: RoomSurfaceOptions = {}) {
    this.startUrl = options.startUrl || DEFAULT_START_URL;
    this.linkName = options.notificationsLinkName || 'お知らせ';
    this.settleMs = options.settleMs ?? 1500;
    this.scrollAttempts = Math.max(1, options.scrollAttempts ?? 2);
    this.actionTimeoutMs = options.actionTimeoutMs ?? 15000;
    this.searchPages = Math.max(1, options.searchPages ?? 5);
    this.selectors = options.selectors ?? ROOM_SELECTORS;
    this.logger = options.logger ?? createLogger('room-surface');
  }

  async open(): Promise<void> {
    const { page } = this;
    await page.goto(this.startUrl, { waitUntil: 'domcontentloaded', timeout: this.actionTimeoutMs });
    const link = page.getByRole('link', { name: this.linkName });
    await link.first().click({ timeout: this.actionTimeoutMs });
    await page.waitForLoadState('domcontentloaded', { timeout: this.actionTimeoutMs });
    this.logger.info('notifications page opened', { url: page.url() });
    try {
      await page.locator(this.selectors.activityTitle).waitFor({ state: 'attached', timeout: this.actionTimeoutMs });
      this.feedAvailable = true;
    } catch {
      // the section is only rendered when there is activity to show
      this.feedAvailable = false;
      this.logger.info('no activity section on the notifications page');
    }
  }

  async listEntries(): Promise<RawActivityEntry[]> {
    if (!this.feedAvailable) return [];
    const selectors = this.selectors;
    const items = await this.page.locator(selectors.activityItem).evaluateAll(
      (elements, args) =>
        elements.map((item) => {
          const text = (selector: string) => item.querySelector(selector)?.textContent ?? null;
          const timestampEl = item.querySelector(args.timestamp);
          return {
            key: item.getAttribute('data-notification-id'),
            userName: text(args.userName),
            imageSrc: item.querySelector(args.profileImage)?.getAttribute('src') ?? null,
            actionText: text(args.actionText),
            timestampTitle: timestampEl?.getAttribute('title') ?? null,
            timestampText: timestampEl?.textContent ?? null,
            followBadgeText: text(args.followBadge),
          };
        }),
      {
        userName: selectors.userName,
        profileImage: selectors.profileImage,
        actionText: selectors.actionText,
        timestamp: selectors.timestamp,
        followBadge: selectors.followBadge,
      },
    );
    return items.map(toRawEntry);
  }

  async loadMore(): Promise<boolean> {
    if (!this.feedAvailable) return false;
    const items = this.page.locator(this.selectors.activityItem);
    const before = await items.count();
    for (let attempt = 0; attempt < this.scrollAttempts; attempt += 1) {
      await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
      await this.page.waitForTimeout(this.settleMs);
      const after = await items.count();
      if (after > before) {
        this.logger.debug('loaded more entries', { before, after });
        return true;
      }
    }
    return false;
  }

  async locateCommentBox(userId: string): Promise<RoomCommentBox | null> {
    const index = await this.findEntryIndex(userId);
    if (index < 0) return null;

    const { page, selectors } = this;
    const item = page.locator(selectors.activityItem).nth(index);
    await item.scrollIntoViewIfNeeded({ timeout: this.actionTimeoutMs });
    await item.locator(selectors.profileLink).click({ timeout: this.actionTimeoutMs });
    await page.waitForLoadState('networkidle', { timeout: this.actionTimeoutMs });
    this.logger.info('profile opened', { userId, url: page.url() });

    const post = await this.pickPost();
    if (!post) {
      this.logger.warn('profile has no posts to comment on', { userId });
      return new RoomCommentBox(userId, null);
    }
    await post.locator(toRobustSelector(selectors.postImageLink)).first().click({ timeout: this.actionTimeoutMs });
    await page.waitForLoadState('networkidle', { timeout: this.actionTimeoutMs });

    const commentButton = page.locator(toRobustSelector(selectors.commentButton)).first();
    try {
      await commentButton.waitFor({ state: 'visible', timeout: this.actionTimeoutMs });
    } catch {
      this.logger.warn('post has no comment button', { userId, url: page.url() });
      return new RoomCommentBox(userId, null);
    }
    await commentButton.click({ timeout: this.actionTimeoutMs });
    const textarea = page.locator(selectors.commentTextarea).first();
    await textarea.waitFor({ state: 'attached', timeout: this.actionTimeoutMs });
    return new RoomCommentBox(userId, textarea);
  }

  async setText(box: RoomCommentBox, text: string): Promise<void> {
    if (!box.locator) {
      throw new Error(`no comment control for ${box.userId}`);
    }
    await box.locator.fill(text, { timeout: this.actionTimeoutMs });
    await this.page.bringToFront();
  }

  private async findEntryIndex(userId: string): Promise<number> {
    for (let page = 1; ; page += 1) {
      const entries = await this.listEntries();
      const index = entries.findIndex((entry) => entry.profileImageUrl && actorIdFromImageUrl(entry.profileImageUrl) === userId);
      if (index >= 0) return index;
      if (page >= this.searchPages || !(await this.loadMore())) return -1;
    }
  }

  /** Post with the most comments; the first post when none has any. */
  private async pickPost(): Promise<Locator | null> {
    const { page, selectors } = this;
    const cards = page.locator(toRobustSelector(selectors.postCard));
    try {
      await cards.first().waitFor({ state: 'visible', timeout: this.actionTimeoutMs });
    } catch {
      return null;
    }
    const counts = await cards.evaluateAll(
      (nodes, iconSelector) =>
        nodes.map((node) => {
          const icon = node.querySelector(iconSelector);
          const value = Number.parseInt(icon?.nextElementSibling?.textContent?.trim() ?? '', 10);
          return Number.isFinite(value) ? value : 0;
        }),
      toRobustSelector(selectors.commentIcon),
    );
    if (counts.length === 0) return null;
    let best = 0;
    for (let i = 1; i < counts.length; i += 1) {
      if (counts[i] > counts[best]) best = i;
    }
    return cards.nth(best);
  }
}
