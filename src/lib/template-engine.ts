import { UserError } from '../types';

const PLACEHOLDER = /{([^}]+)}/g;

export class TemplateEngine {
  /**
   * Render a template with provided values.
   * Values are inserted verbatim and never rescanned for placeholders.
   */
  static render(template: string, values: Record<string, string>): string {
    const rendered = template.replace(PLACEHOLDER, (match, key: string) => {
      const value = values[key];
      if (value === undefined) {
        throw new UserError(
          `Missing template value: ${key}`,
          `The template expects {${TemplateEngine.extractParams(template).join('}, {')}}`,
        );
      }
      return value;
    });

    return rendered.trim();
  }

  /**
   * Extract parameter names from a template
   */
  static extractParams(template: string): string[] {
    const params = new Set<string>();

    for (const match of template.matchAll(PLACEHOLDER)) {
      params.add(match[1]);
    }

    return Array.from(params);
  }
}
