import { ConfigError } from '../../errors/src/index.js';
import type { UserRecord } from '../../record-store/src/types.js';
import { evaluate } from './predicates.js';
import { renderTemplate } from './render.js';
import { FALLBACK, type StagingRequest, type Template } from './types.js';

/**
 * Returns the first template whose predicate matches `record`, in declared
 * order; the fallback template is tried last wherever it is declared.
 */
export function selectTemplate(record: UserRecord, templates: readonly Template[]): Template {
  let fallback: Template | undefined;
  for (const template of templates) {
    if (template.when === FALLBACK) {
      fallback ??= template;
      continue;
    }
    if (evaluate(template.when, record)) return template;
  }
  if (!fallback) {
    throw new ConfigError('template set has no fallback template', { templateIds: templates.map((t) => t.id) });
  }
  return fallback;
}

export function buildStagingRequest(record: UserRecord, templates: readonly Template[]): StagingRequest {
  const template = selectTemplate(record, templates);
  return {
    userId: record.userId,
    templateId: template.id,
    renderedText: renderTemplate(template, record),
  };
}
