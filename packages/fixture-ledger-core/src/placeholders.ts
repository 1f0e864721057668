/** `{<field path> <type name> "<id>"}`, e.g. `{address.street of person "alice"}` */
export const PLACEHOLDER_PATTERN = /\{([\w.]+)\s+([^}]+)\s+"([^}"]+)"\}/;

const createGlobalPattern = (): RegExp => new RegExp(PLACEHOLDER_PATTERN.source, 'g');

export type Placeholder = {
  token: string;
  field: string;
  type: string;
  id: string;
};

export function findPlaceholders(text: string): Placeholder[] {
  return Array.from(text.matchAll(createGlobalPattern()), ([token, field, type, id]) => ({ token, field, type, id }));
}

/**
 * Resolves every placeholder in order and substitutes the results.
 */
export async function replacePlaceholders(
  text: string,
  resolve: (placeholder: Placeholder) => Promise<unknown>,
): Promise<string> {
  const values: string[] = [];

  for (const placeholder of findPlaceholders(text)) {
    values.push(formatPlaceholderValue(await resolve(placeholder)));
  }

  let index = 0;

  return text.replace(createGlobalPattern(), () => values[index++]);
}

export function formatPlaceholderValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === 'object') {
    return JSON.stringify(value);
  }

  return String(value);
}
