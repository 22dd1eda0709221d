import { withTimeout } from '../../activity-extractor/src/timeout.js';
import type { ActivitySurface, CommentBox } from '../../activity-extractor/src/surface.js';
import { createLogger, type Logger } from '../../logging/src/index.js';

export const STAGED_OUTCOMES = ['staged', 'user_not_found', 'input_blocked'] as const;

export type StagedOutcome = (typeof STAGED_OUTCOMES)[number];

export interface StageOptions {
  /** Bound on the whole staging call; expiry raises ExtractionError (timeout) */
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Puts `text` into the comment control of `userId`'s activity entry. Nothing
 * is submitted and nothing is retried; the operator decides what happens next.
 */
export async function stage<Box extends CommentBox>(
  surface: ActivitySurface<Box>,
  userId: string,
  text: string,
  options: StageOptions = {},
): Promise<StagedOutcome> {
  const logger = options.logger ?? createLogger('staging-driver');
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return withTimeout<StagedOutcome>(`stage comment for ${userId}`, timeoutMs, async () => {
    const box = await surface.locateCommentBox(userId);
    if (!box) {
      logger.warn('user entry not on the page', { userId });
      return 'user_not_found';
    }
    if (!(await box.isEditable())) {
      logger.warn('comment box is not editable', { userId });
      return 'input_blocked';
    }
    await surface.setText(box, text);
    logger.info('comment staged; submit it manually', { userId, length: text.length });
    return 'staged';
  });
}
