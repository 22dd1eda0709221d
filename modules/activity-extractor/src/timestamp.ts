/**
 * Timestamp parsing for the notifications feed. The platform shows Japan
 * time (UTC+9, no DST) either as an absolute date or as a relative phrase.
 *
 * Supported formats:
 * - "2026/03/01 12:34" / "2026/3/1 12:34:56" / "2026-03-01 12:34"
 * - "2026年3月1日 12:34"
 * - ISO-8601 with an explicit offset ("2026-03-01T03:34:00Z")
 * - "たった今" / "N秒前" / "N分前" / "N時間前" / "N日前"
 * - "今日 12:34" / "昨日 12:34"
 */

const JST_OFFSET_MS = 9 * 60 * 60 * 1000;
const MINUTE = 60 * 1000;
const UNIT_MS: Record<string, number> = {
  秒: 1000,
  分: MINUTE,
  時間: 60 * MINUTE,
  日: 24 * 60 * MINUTE,
};

function jstToIso(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) return null;
  const ms = Date.UTC(year, month - 1, day, hour, minute, second) - JST_OFFSET_MS;
  const check = new Date(ms + JST_OFFSET_MS);
  if (check.getUTCDate() !== day) return null;
  return new Date(ms).toISOString();
}

function jstDayStart(now: Date, daysAgo: number): { year: number; month: number; day: number } {
  const shifted = new Date(now.getTime() + JST_OFFSET_MS - daysAgo * 24 * 60 * MINUTE);
  return { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth() + 1, day: shifted.getUTCDate() };
}

const ABSOLUTE_DATE = /^(\d{4})[/-](\d{1,2})[/-](\d{1,2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const KANJI_DATE = /^(\d{4})年(\d{1,2})月(\d{1,2})日(?:\s*(\d{1,2}):(\d{2}))?$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}T.*(Z|[+-]\d{2}:?\d{2})$/;

/** True for text that names the same instant whenever it is read. */
export function isAbsoluteTimestamp(text: string | null | undefined): boolean {
  const trimmed = String(text ?? '').trim();
  return ABSOLUTE_DATE.test(trimmed) || KANJI_DATE.test(trimmed) || ISO_DATE.test(trimmed);
}

export function parseRoomTimestamp(text: string | null | undefined, now: Date = new Date()): string | null {
  const trimmed = String(text ?? '').trim();
  if (!trimmed) return null;

  const absolute = trimmed.match(ABSOLUTE_DATE);
  if (absolute) {
    const [, y, mo, d, h, mi, s] = absolute;
    return jstToIso(Number(y), Number(mo), Number(d), Number(h ?? 0), Number(mi ?? 0), Number(s ?? 0));
  }

  const kanji = trimmed.match(KANJI_DATE);
  if (kanji) {
    const [, y, mo, d, h, mi] = kanji;
    return jstToIso(Number(y), Number(mo), Number(d), Number(h ?? 0), Number(mi ?? 0));
  }

  if (ISO_DATE.test(trimmed)) {
    const ms = Date.parse(trimmed);
    return Number.isNaN(ms) ? null : new Date(ms).toISOString();
  }

  if (trimmed === 'たった今' || trimmed === '今') {
    return new Date(now.getTime()).toISOString();
  }

  const relative = trimmed.match(/^(\d+)\s*(秒|分|時間|日)前$/);
  if (relative) {
    const amount = Number(relative[1]);
    return new Date(now.getTime() - amount * (UNIT_MS[relative[2]] ?? 0)).toISOString();
  }

  const dayRelative = trimmed.match(/^(今日|昨日|一昨日)\s*(\d{1,2}):(\d{2})$/);
  if (dayRelative) {
    const daysAgo = dayRelative[1] === '今日' ? 0 : dayRelative[1] === '昨日' ? 1 : 2;
    const { year, month, day } = jstDayStart(now, daysAgo);
    return jstToIso(year, month, day, Number(dayRelative[2]), Number(dayRelative[3]));
  }

  return null;
}
