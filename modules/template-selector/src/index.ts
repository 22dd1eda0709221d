export * from './types.js';
export { evaluate } from './predicates.js';
export { renderTemplate, listPlaceholders, isKnownPlaceholder, PLACEHOLDER_NAMES } from './render.js';
export { selectTemplate, buildStagingRequest } from './select.js';
export { loadTemplates, parseTemplates } from './loader.js';
