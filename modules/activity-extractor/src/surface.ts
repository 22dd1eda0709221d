/**
 * Capability interface over the live notifications page. The extractor and
 * the staging driver only talk to the browser through this, so both can be
 * exercised against an in-memory implementation.
 */

export interface RawActivityEntry {
  /** Stable per-entry key when the page exposes one */
  key?: string | null;
  userId?: string | null;
  userName: string | null;
  profileImageUrl: string | null;
  actionText: string | null;
  /** Timestamp as shown by the page (title attribute or visible text) */
  timestampText: string | null;
  targetId?: string | null;
  isFollowing: boolean | null;
}

export interface CommentBox {
  /** False when the control exists but cannot take input (disabled, read-only, hidden) */
  isEditable(): Promise<boolean>;
}

export interface ActivitySurface<Box extends CommentBox = CommentBox> {
  /** Navigates to the first page of the activity feed. */
  open(): Promise<void>;
  /** Entries currently rendered, oldest page last. */
  listEntries(): Promise<RawActivityEntry[]>;
  /** Requests the next page; resolves false when the feed has no more content. */
  loadMore(): Promise<boolean>;
  /** Comment control for the user's activity entry, or null when the entry is not on the page. */
  locateCommentBox(userId: string): Promise<Box | null>;
  /** Replaces the control's content. Must not submit. */
  setText(box: Box, text: string): Promise<void>;
}
