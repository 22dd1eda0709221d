import { TemplateRenderError } from '../../errors/src/index.js';
import { totalCount, type UserRecord } from '../../record-store/src/types.js';
import type { Template } from './types.js';

type PlaceholderValue = (record: UserRecord) => string | number | null;

const PLACEHOLDERS: Record<string, PlaceholderValue> = {
  userId: (r) => r.userId,
  displayName: (r) => r.displayName,
  totalCount: (r) => totalCount(r.counts),
  likeCount: (r) => r.counts.like,
  followCount: (r) => r.counts.follow,
  commentCount: (r) => r.counts.comment,
  collectCount: (r) => r.counts.collect,
  otherCount: (r) => r.counts.other,
  firstSeenAt: (r) => r.firstSeenAt,
  lastSeenAt: (r) => r.lastSeenAt,
  lastCommentedAt: (r) => r.lastCommentedAt,
};

export const PLACEHOLDER_NAMES: readonly string[] = Object.freeze(Object.keys(PLACEHOLDERS));

// `{{` and `}}` are literal braces; `{name}` is a placeholder
const TOKEN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function listPlaceholders(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(TOKEN)) {
    if (match[1] && !names.includes(match[1])) names.push(match[1]);
  }
  return names;
}

export function isKnownPlaceholder(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(PLACEHOLDERS, name);
}

export function renderTemplate(template: Template, record: UserRecord): string {
  return template.text.replace(TOKEN, (token: string, name: string | undefined) => {
    if (token === '{{') return '{';
    if (token === '}}') return '}';
    const key = name ?? '';
    if (!isKnownPlaceholder(key)) {
      throw new TemplateRenderError(`template ${template.id} references unknown placeholder {${key}}`, {
        templateId: template.id,
        placeholder: key,
      });
    }
    const value = PLACEHOLDERS[key](record);
    if (value === null) {
      throw new TemplateRenderError(`template ${template.id}: {${key}} has no value for user ${record.userId}`, {
        templateId: template.id,
        placeholder: key,
        userId: record.userId,
      });
    }
    return String(value);
  });
}
