import { promises as fs } from 'node:fs';
import { Ajv, type ValidateFunction } from 'ajv';
import { ConfigError, errnoCode, errorMessage } from '../../errors/src/index.js';
import { isKnownPlaceholder, listPlaceholders } from './render.js';
import { templateFileSchema } from './schema.js';
import { FALLBACK, type Template, type TemplateSet } from './types.js';

let validateFn: ValidateFunction<TemplateSet> | null = null;

function templateValidator(): ValidateFunction<TemplateSet> {
  if (!validateFn) {
    const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
    validateFn = ajv.compile<TemplateSet>(templateFileSchema);
  }
  return validateFn;
}

function checkTemplates(templates: Template[]): string[] {
  const problems: string[] = [];
  const ids = new Set<string>();
  let fallbacks = 0;
  for (const template of templates) {
    if (ids.has(template.id)) problems.push(`duplicate template id ${template.id}`);
    ids.add(template.id);
    if (template.when === FALLBACK) fallbacks += 1;
    if (!template.text.trim()) problems.push(`template ${template.id} has empty text`);
    for (const name of listPlaceholders(template.text)) {
      if (!isKnownPlaceholder(name)) problems.push(`template ${template.id} uses unknown placeholder {${name}}`);
    }
  }
  if (fallbacks !== 1) problems.push(`expected exactly one fallback template, found ${fallbacks}`);
  return problems;
}

/** Validates a parsed template file; every problem is reported in one ConfigError. */
export function parseTemplates(value: unknown, source = '<memory>'): Template[] {
  const validate = templateValidator();
  if (!validate(value)) {
    const details = (validate.errors || []).map((e) => `${e.instancePath || '/'} ${e.message || 'invalid'}`);
    throw new ConfigError(`template file ${source} is invalid:\n  - ${details.join('\n  - ')}`, { source, details });
  }
  const problems = checkTemplates(value.templates);
  if (problems.length > 0) {
    throw new ConfigError(`template file ${source} is invalid:\n  - ${problems.join('\n  - ')}`, {
      source,
      details: problems,
    });
  }
  return value.templates;
}

export async function loadTemplates(filePath: string): Promise<Template[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    const reason = errnoCode(err) === 'ENOENT' ? 'not found' : errorMessage(err);
    throw new ConfigError(`template file ${filePath}: ${reason}`, { source: filePath }, { cause: err });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`template file ${filePath} is not valid JSON: ${errorMessage(err)}`, { source: filePath }, { cause: err });
  }
  return parseTemplates(parsed, filePath);
}
