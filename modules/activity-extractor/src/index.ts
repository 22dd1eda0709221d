export type { ActivitySurface, CommentBox, RawActivityEntry } from './surface.js';
export {
  ActivityStream,
  collectAll,
  extract,
  type ExtractionStats,
  type ExtractOptions,
  type StopReason,
} from './extractor.js';
export {
  NO_PROFILE_IMAGE,
  actorIdFromImageUrl,
  classifyAction,
  deriveEventId,
  hasNoProfileImage,
  parseEntry,
  rawEntryKey,
} from './parse.js';
export { parseRoomTimestamp } from './timestamp.js';
export { withTimeout } from './timeout.js';
export { NOT_FOLLOWING_TEXT, ROOM_SELECTORS, toRobustSelector, type RoomSelectors } from './selectors.js';
export {
  DEFAULT_START_URL,
  RoomActivitySurface,
  RoomCommentBox,
  toRawEntry,
  type ActivityItemFields,
  type RoomSurfaceOptions,
} from './room-surface.js';
