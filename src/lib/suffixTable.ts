/**
 * Suffix classification: maps the raw suffix token of an input filename
 * (`deny`, `bypass`, ...) to the test-type code embedded in the renamed
 * filename and in the `X-Test-Type` header.
 *
 * The table is a flat ordered list. Entries are searched in order, so a raw
 * suffix listed under two categories resolves to the earlier category.
 */

export const SUFFIX_CATEGORY_ORDER = ['positive', 'negative', 'exclusion'] as const;

export interface SuffixEntry {
  category: string;
  raw: string;
  mapped: string;
}

export type SuffixTable = readonly SuffixEntry[];

export type SuffixCategories = Record<string, Record<string, string>>;

export const DEFAULT_SUFFIX_TABLE: SuffixTable = Object.freeze([
  { category: 'positive', raw: 'deny', mapped: 'LR' },
  { category: 'negative', raw: 'bypass', mapped: 'NR' },
  { category: 'exclusion', raw: 'market', mapped: 'EX' },
  { category: 'exclusion', raw: 'date', mapped: 'EX' },
]);

// Category precedence follows the object's key insertion order.
export function suffixTableFromCategories(categories: SuffixCategories): SuffixTable {
  const entries: SuffixEntry[] = [];
  for (const [category, mapping] of Object.entries(categories)) {
    for (const [raw, mapped] of Object.entries(mapping)) {
      entries.push({ category, raw, mapped });
    }
  }
  return Object.freeze(entries);
}

export function lookupSuffix(raw: string, table: SuffixTable = DEFAULT_SUFFIX_TABLE): SuffixEntry | undefined {
  return table.find((e) => e.raw === raw);
}

/** Unknown suffixes pass through unchanged. */
export function classifySuffix(raw: string, table: SuffixTable = DEFAULT_SUFFIX_TABLE): string {
  return lookupSuffix(raw, table)?.mapped ?? raw;
}
