/**
 * Page selectors for the Rakuten ROOM notifications feed and the comment form.
 * Class names with a build hash (`container--a3dH_`) change on every deploy
 * and go through toRobustSelector before use.
 */
export const ROOM_SELECTORS = {
  activityTitle: "div.title[ng-show='notifications.activityNotifications.length > 0']",
  activityItem: "li[ng-repeat='notification in notifications.activityNotifications']",
  userName: 'span.notice-name span.strong',
  profileImage: 'div.left-img img',
  profileLink: 'div.left-img',
  actionText: 'div.right-text > p',
  timestamp: 'span.notice-time',
  followBadge: 'span.follow',
  postCard: 'div.container--a3dH_',
  postImageLink: 'a.link-image--15_8Q',
  commentIcon: 'div.rex-comment-outline--2vaPK',
  commentButton: 'div.pointer--3rZ2h:has-text("コメント")',
  commentTextarea: 'textarea[placeholder="コメントを書いてください"]',
} as const;

export type RoomSelectors = typeof ROOM_SELECTORS;

/** Badge text shown on entries whose user the operator does not follow */
export const NOT_FOLLOWING_TEXT = '未フォロー';

/**
 * Rewrites hashed CSS-module classes to attribute prefix matches:
 * 'div.container--a3dH_ a.link--15_8Q' → 'div[class*="container--"] a[class*="link--"]'
 */
export function toRobustSelector(selector: string): string {
  if (!selector) return '';
  return selector.replace(/\.([\w-]+?--)[\w-]+/g, (_match, base: string) => `[class*="${base}"]`);
}
