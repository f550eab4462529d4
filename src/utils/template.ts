/**
 * `{placeholder}` rendering for file names and messages.
 */

/**
 * Replace `{name}` placeholders; unknown names are left as they are.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => values[key] ?? match);
}
