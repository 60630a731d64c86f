import type { TemplateVariables } from '@core/interfaces/flow.types.js';

const PLACEHOLDER = /\{\{([^{}]+)\}\}/g;

/**
 * Replaces `{{key}}` placeholders in one pass. Placeholders without a value
 * are left as they are, and substituted values are never re-scanned.
 */
export function renderVars(template: string, vars: TemplateVariables): string {
  if (!template) return template;
  return template.replace(PLACEHOLDER, (match, key: string) =>
    Object.hasOwn(vars, key) ? vars[key] : match,
  );
}
