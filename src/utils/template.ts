export type TemplateValue = string | number | boolean | string[] | undefined;

export type TemplateVars = Record<string, TemplateValue>;

function isTruthy(value: TemplateValue): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return value !== undefined && value !== false && value !== '';
}

/**
 * Minimal mustache-style renderer.
 *
 * - `{{#each list}}…{{/each}}` repeats the body per item, exposing `{{this}}`
 *   and the 1-based `{{@number}}`
 * - `{{#if var}}…{{else}}…{{/if}}`
 * - `{{var}}`; arrays are joined with ", ", unknown names are left in place
 *
 * Values substituted for `{{var}}` are not re-scanned, so user text containing
 * braces is inserted verbatim.
 */
export function renderTemplate(template: string, vars: TemplateVars): string {
  const withLoops = template.replace(
    /\{\{#each (\w+)\}\}([\s\S]*?)\{\{\/each\}\}/g,
    (_match, key: string, body: string) => {
      const value = vars[key];
      if (!Array.isArray(value)) return '';
      return value
        .map((item: string, index: number) =>
          body.replace(/\{\{(this|@number)\}\}/g, (_m, token: string) =>
            token === 'this' ? item : String(index + 1),
          ),
        )
        .join('');
    },
  );

  const withConditionals = withLoops.replace(
    /\{\{#if (\w+)\}\}([\s\S]*?)\{\{\/if\}\}/g,
    (_match, key: string, body: string) => {
      const [whenTrue, whenFalse = ''] = body.split('{{else}}');
      return isTruthy(vars[key]) ? whenTrue : whenFalse;
    },
  );

  return withConditionals.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    const value = vars[key];
    if (value === undefined) return match;
    if (Array.isArray(value)) return value.join(', ');
    return String(value);
  });
}
