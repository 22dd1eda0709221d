import type { ActionKind } from '../../record-store/src/types.js';

export type Predicate =
  | { countAtLeast: { kind: ActionKind; min: number } }
  | { countBelow: { kind: ActionKind; max: number } }
  | { totalAtLeast: number }
  | { isFollowing: boolean }
  | { commentedBefore: boolean }
  | { all: Predicate[] }
  | { any: Predicate[] }
  | { not: Predicate };

export const FALLBACK = 'fallback';

export interface Template {
  id: string;
  /** Predicate, or "fallback" for the template that matches unconditionally */
  when: Predicate | typeof FALLBACK;
  text: string;
  description?: string;
}

export interface TemplateSet {
  templates: Template[];
}

export interface StagingRequest {
  userId: string;
  templateId: string;
  renderedText: string;
}
