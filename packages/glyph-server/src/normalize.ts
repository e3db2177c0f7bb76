/**
 * Characters that split a glyph name into words. The same set drives the
 * matcher's word-boundary bonus and the index normalization.
 */
export const SEPARATORS: ReadonlySet<string> = new Set(['-', '_', ' ', '.', '/']);

export function isSeparator(ch: string | undefined): boolean {
  return ch !== undefined && SEPARATORS.has(ch);
}

/** `nf-md-account_box` -> `nf md account box` */
export function normalizeName(value: string): string {
  return value
    .toLowerCase()
    .replace(/[-_./]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function splitWords(normalized: string): string[] {
  return normalized.split(' ').filter(Boolean);
}

export interface NameMetadata {
  prefix: string;
  category: string;
  normalized: string;
}

// "nf-cod-account" -> prefix "nf", category "cod", normalized "cod account"
export function extractMetadata(name: string): NameMetadata {
  const parts = name.split('-');
  const prefix = parts[0] ?? '';
  const category = parts.length >= 2 ? parts[1] : '';
  const normalized = parts.length > 1 ? parts.slice(1).join(' ') : name;
  return { prefix, category, normalized };
}

export function deriveCategory(name: string): string | undefined {
  const { category } = extractMetadata(name);
  return category || undefined;
}

export function deriveTags(name: string): string[] {
  return name.split('-').slice(2).filter(Boolean);
}
