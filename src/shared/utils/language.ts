/**
 * Locale tag helpers for voice language metadata
 */

const displayNames = new Intl.DisplayNames(['en'], { type: 'language', fallback: 'none' });

/**
 * Canonicalise a locale tag as found in bundle metadata.
 * Underscores are accepted (`en_US` → `en-US`); tags that are still invalid are returned as-is.
 */
export function standardizeTag(tag: string): string {
  const candidate = tag.trim().replace(/_/g, '-');
  try {
    const [canonical] = Intl.getCanonicalLocales(candidate);
    return canonical ?? tag;
  } catch {
    return tag;
  }
}

/**
 * Human-readable name for a full tag, including region (e.g. "American English")
 */
export function languageDisplayName(tag: string): string | null {
  try {
    return displayNames.of(tag) ?? null;
  } catch {
    return null;
  }
}

/**
 * Human-readable name for the language part only (e.g. "English" for `en-US`)
 */
export function languageName(tag: string): string | null {
  const base = tag.split('-')[0];
  if (!base) return null;
  return languageDisplayName(base);
}

/**
 * Sorted distinct non-null names
 */
export function uniqueSorted(names: Array<string | null>): string[] {
  const set = new Set<string>();
  for (const name of names) {
    if (name) set.add(name);
  }
  return Array.from(set).sort((a, b) => a.localeCompare(b));
}
