/**
 * Characters marking technical, namespaced or subpage titles
 * (e.g. "Категорія:Рим", "Рим/Історія"); such pages are never raced through.
 */
export const TITLE_RED_FLAGS: readonly string[] = ['/', ':'];

/** Longest title the page cache stores (wikipage.title is varchar(150)) */
export const MAX_TITLE_LENGTH = 150;

export function isValidTitle(title: string): boolean {
  if (title.trim().length === 0) return false;
  // varchar length counts characters, not UTF-16 units
  if ([...title].length > MAX_TITLE_LENGTH) return false;
  return !TITLE_RED_FLAGS.some((flag) => title.includes(flag));
}

export function filterTitles(titles: Iterable<string>): string[] {
  const result: string[] = [];
  for (const title of titles) {
    if (isValidTitle(title)) {
      result.push(title);
    }
  }
  return result;
}
